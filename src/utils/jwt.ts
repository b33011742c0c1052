import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { getConfig } from './config';
import { ROLES, Role } from './permissions';

export type JwtPayload = {
  userId: string;
  role: Role;
};

const payloadSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(ROLES)
});

/**
 * Generates a signed JWT for the supplied payload.
 * @param payload Data to embed in token.
 * @returns Signed JWT string.
 */
export function signToken(payload: JwtPayload): string {
  const { jwtSecret, jwtExpirySeconds } = getConfig();
  return jwt.sign(payload, jwtSecret, { expiresIn: jwtExpirySeconds });
}

/**
 * Verifies a JWT and returns its payload.
 * @param token JWT string to verify.
 * @returns Decoded payload if valid, null when the claims have the wrong shape.
 * @throws {jwt.JsonWebTokenError} When the signature or expiry is invalid.
 */
export function verifyToken(token: string): JwtPayload | null {
  const decoded = jwt.verify(token, getConfig().jwtSecret);
  const result = payloadSchema.safeParse(decoded);
  return result.success ? result.data : null;
}
