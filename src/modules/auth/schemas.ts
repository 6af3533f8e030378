import { z } from "zod";

import { createUserSchema } from "../users/schemas.js";

export const registerSchema = createUserSchema;

/** Sign in with either email or username. */
export const tokenSchema = z
  .object({
    email: z.string().trim().min(1).optional(),
    username: z.string().trim().min(1).optional(),
    password: z.string().min(1, "Password is required"),
  })
  .refine((d) => Boolean(d.email || d.username), {
    message: "email or username is required",
    path: ["email"],
  });

export const refreshSchema = z.object({
  refreshToken: z.string().min(1, "refreshToken is required"),
});
