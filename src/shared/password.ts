import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

export type ScryptParams = {
  N: number;
  r: number;
  p: number;
  keylen: number;
};

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, encoded: string): Promise<boolean>;
}

const DEFAULT_SCRYPT: ScryptParams = {
  N: 16384,
  r: 8,
  p: 1,
  keylen: 64,
};

// Format: scrypt$1$N$r$p$salt$hash
const FORMAT_VERSION = "1";

function scryptAsync(
  password: string,
  salt: Buffer,
  keylen: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keylen, options, (err, derivedKey) => {
      if (err) {return reject(err);}
      resolve(derivedKey);
    });
  });
}

type ParsedHash = {
  params: ScryptParams;
  salt: Buffer;
  hash: Buffer;
};

function parseScryptHash(encoded: string): ParsedHash | null {
  const parts = encoded.split("$");
  if (parts.length !== 7) {return null;}
  const [kind, version, Nraw, rraw, praw, saltB64, hashB64] = parts;
  if (kind !== "scrypt" || version !== FORMAT_VERSION) {return null;}

  const N = Number(Nraw);
  const r = Number(rraw);
  const p = Number(praw);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) {return null;}
  if (N <= 1 || r <= 0 || p <= 0) {return null;}

  const salt = Buffer.from(saltB64, "base64url");
  const hash = Buffer.from(hashB64, "base64url");
  if (salt.length < 8 || hash.length < 32) {return null;}

  return { params: { N, r, p, keylen: hash.length }, salt, hash };
}

/**
 * Salted scrypt hasher. Hashes carry their own parameters, so a hasher with
 * different defaults still verifies older hashes.
 */
export function createScryptHasher(overrides: Partial<ScryptParams> = {}): PasswordHasher {
  const params: ScryptParams = { ...DEFAULT_SCRYPT, ...overrides };

  return {
    async hash(password) {
      const salt = randomBytes(16);
      const derived = await scryptAsync(password, salt, params.keylen, {
        N: params.N,
        r: params.r,
        p: params.p,
      });
      return [
        "scrypt",
        FORMAT_VERSION,
        params.N,
        params.r,
        params.p,
        salt.toString("base64url"),
        derived.toString("base64url"),
      ].join("$");
    },

    async verify(password, encoded) {
      const parsed = parseScryptHash(encoded);
      if (!parsed) {return false;}

      const derived = await scryptAsync(password, parsed.salt, parsed.params.keylen, {
        N: parsed.params.N,
        r: parsed.params.r,
        p: parsed.params.p,
      });

      if (derived.length !== parsed.hash.length) {return false;}
      return timingSafeEqual(derived, parsed.hash);
    },
  };
}

export const passwordHasher = createScryptHasher();
