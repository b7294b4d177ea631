import { z } from 'zod';
import { checkPasswordPolicy, passwordRuleMessage } from '../../domain/auth/passwordPolicy.js';

export const usernameSchema = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters long')
  .max(50, 'Username must be at most 50 characters long')
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, ".", "_" and "-"');

export const emailSchema = z.string().trim().toLowerCase().email('Invalid email address').max(255);

/**
 * One issue per violated rule, so clients see every problem at once.
 */
export const passwordSchema = z.string().superRefine((candidate, ctx) => {
  for (const rule of checkPasswordPolicy(candidate).violations) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: passwordRuleMessage(rule) });
  }
});

const nameSchema = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .nullish()
  .transform((value) => value ?? null);

export const registerBodySchema = z.object({
  username: usernameSchema,
  email: emailSchema,
  password: passwordSchema,
  firstName: nameSchema,
  lastName: nameSchema,
});

/** `username` takes either a username or an email address. */
export const loginBodySchema = z.object({
  username: z.string().trim().min(3).max(255),
  password: passwordSchema,
});
