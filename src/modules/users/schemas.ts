import { z } from "zod";

import { CONTACT_KEY_MAX, CONTACT_KEY_MIN } from "./contactKey.js";
import { MIN_PASSWORD_LENGTH } from "./service.js";

export const passwordPolicy = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
  .max(128);

export const createUserSchema = z.object({
  username: z.string().trim().min(1, "Username is required").max(150),
  email: z.string().trim().toLowerCase().email("Must use a valid email address"),
  password: passwordPolicy,
});

export const updateMeSchema = createUserSchema
  .partial()
  .strict()
  .refine((v) => Object.keys(v).length > 0, { message: "Nothing to update" });

export const contactKeyParam = z.object({
  contactKey: z.coerce.number().int().min(CONTACT_KEY_MIN).max(CONTACT_KEY_MAX),
});
