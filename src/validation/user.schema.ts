import { z } from 'zod';
import { EFFECTS, ROLES } from '../utils/permissions';
import { idParam, optionalBooleanQuery, pagingQuery, sortQuery } from './common.schema';

const email = z.string().trim().email();
const password = z.string().min(8).max(40);
const fullName = z.string().trim().min(1).max(255);
const role = z.enum(ROLES);

export const updateMeSchema = z.object({
  body: z
    .object({
      email: email.optional(),
      fullName: fullName.nullable().optional()
    })
    .strict()
});

export const changePasswordSchema = z.object({
  body: z.object({
    currentPassword: z.string().min(1),
    newPassword: password
  })
});

export const listUsersSchema = z.object({
  query: z.object({
    ...pagingQuery,
    search: z.string().trim().min(1).optional(),
    role: role.optional(),
    isActive: optionalBooleanQuery,
    sort: sortQuery(['email', 'role', 'isActive', 'createdAt'], 'email')
  })
});

export const createUserSchema = z.object({
  body: z.object({
    email,
    password,
    fullName: fullName.optional(),
    role: role.default('member'),
    isSuperuser: z.boolean().default(false),
    isActive: z.boolean().default(true)
  })
});

export const userIdSchema = z.object({
  params: z.object({ userId: idParam })
});

export const updateUserSchema = z.object({
  params: z.object({ userId: idParam }),
  body: z
    .object({
      email: email.optional(),
      password: password.optional(),
      fullName: fullName.nullable().optional(),
      role: role.optional(),
      isSuperuser: z.boolean().optional(),
      isActive: z.boolean().optional()
    })
    .strict()
});

export const createOverrideSchema = z.object({
  params: z.object({ userId: idParam }),
  body: z.object({
    permission: z.string().trim().min(1).max(100),
    effect: z.enum(EFFECTS)
  })
});

export const overrideIdSchema = z.object({
  params: z.object({ userId: idParam, overrideId: idParam })
});
