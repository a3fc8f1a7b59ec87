/* eslint-disable no-console */
import "dotenv/config";

import { randomUUID } from "node:crypto";

import { createPostsRepository } from "../modules/posts/index.js";
import { createUsersRepository } from "../modules/users/index.js";
import { getAppConfig, envString } from "../shared/config.js";
import { openDatabase } from "../shared/database.js";
import type { Role, UserRow } from "../shared/db-schema.js";
import { passwordHasher } from "../shared/password.js";

type SeedUser = {
  username: string;
  email: string;
  password: string;
  role: Role;
};

async function main() {
  console.log("🌱 Seeding users, posts and comments...");

  const { databaseUrl } = getAppConfig();
  const database = openDatabase(databaseUrl);
  const users = createUsersRepository(database.db);
  const posts = createPostsRepository(database.db);

  const seedUsers: SeedUser[] = [
    {
      username: "admin",
      email: "admin@example.com",
      password: envString("SEED_ADMIN_PASSWORD") || "change-me-admin",
      role: "Admin",
    },
    {
      username: "demo",
      email: "demo@example.com",
      password: envString("SEED_USER_PASSWORD") || "change-me-demo",
      role: "User",
    },
  ];

  const created: UserRow[] = [];
  for (const u of seedUsers) {
    const existing = await users.findByEmail(u.email);
    if (existing) {
      console.log(`  - ${u.email} already exists, skipping`);
      created.push(existing);
      continue;
    }

    const inserted = await users.insert({
      id: randomUUID(),
      username: u.username,
      email: u.email,
      passwordHash: await passwordHasher.hash(u.password),
      role: u.role,
      createdAt: new Date(),
    });
    if (inserted.isErr()) {
      throw new Error(`Could not create ${u.email}: ${inserted.error.field} already taken`);
    }
    console.log(`  + ${u.email} (${u.role})`);
    created.push(inserted.value);
  }

  const [admin, demo] = created;
  if (admin && demo && (await posts.count({ userId: { eq: demo.id } })) === 0) {
    const first = await posts.insert({
      id: randomUUID(),
      content: "Hello from the demo account",
      createdAt: new Date(),
      updatedAt: null,
      userId: demo.id,
    });
    await posts.insertComment({
      id: randomUUID(),
      text: "Welcome aboard!",
      createdAt: new Date(),
      userId: admin.id,
      postId: first.id,
    });
    console.log("  + sample post and comment");
  }

  database.close();
  console.log("✅ Seed complete");
}

main().catch((err: unknown) => {
  console.error("❌ Seed failed:", err);
  process.exit(1);
});
