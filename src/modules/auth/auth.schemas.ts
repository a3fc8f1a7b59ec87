/**
 * Auth Schemas
 * ============
 * Validation for register / login inputs. Every failing field is reported,
 * not just the first.
 */

import { z } from "zod";

const USERNAME_MIN = 3;
const USERNAME_MAX = 50;
const PASSWORD_MIN = 6;

const emailFormat = z.string().email();

const usernameSchema = z
  .string({ required_error: "Username is required" })
  .trim()
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Username is required" });
    } else if (value.length < USERNAME_MIN) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Username must be at least ${USERNAME_MIN} characters` });
    } else if (value.length > USERNAME_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Username must be at most ${USERNAME_MAX} characters` });
    }
  });

const emailSchema = z
  .string({ required_error: "Email is required" })
  .trim()
  .toLowerCase()
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Email is required" });
    } else if (!emailFormat.safeParse(value).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Email must be a valid email address" });
    }
  });

const passwordSchema = z
  .string({ required_error: "Password is required" })
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Password is required" });
    } else if (value.length < PASSWORD_MIN) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Password must be at least ${PASSWORD_MIN} characters` });
    }
  });

export const registerInputSchema = z.object({
  username: usernameSchema,
  email: emailSchema,
  password: passwordSchema,
});

export type RegisterInput = z.infer<typeof registerInputSchema>;

export const loginInputSchema = z.object({
  email: z.string().trim().toLowerCase(),
  password: z.string(),
});

export type LoginInput = z.infer<typeof loginInputSchema>;
