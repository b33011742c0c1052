import { z } from 'zod';

const email = z.string().trim().email();
const password = z.string().min(8).max(40);

export const signupSchema = z.object({
  body: z.object({
    email,
    password,
    fullName: z.string().trim().min(1).max(255).optional()
  })
});

export const loginSchema = z.object({
  body: z.object({
    email,
    password: z.string().min(1)
  })
});
