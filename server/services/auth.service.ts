// =============================================================
// File: server/services/auth.service.ts
// Description: Identity comes from an external provider as a
//   bearer JWT signed with the shared JWT_SECRET. This service
//   only verifies it and turns its claims into an Actor:
//     sub  → userId
//     name → displayName
//     role → 'admin' | 'user'
// =============================================================

import jwt from 'jsonwebtoken';
import { config } from '../config';
import { UnauthorizedError } from '../lib/errors';
import type { Actor, UserRole } from '../../shared/types';

const DEFAULT_EXPIRES_IN_SECONDS = 12 * 60 * 60;

function parseRole(value: unknown): UserRole | null {
  return value === 'admin' || value === 'user' ? value : null;
}

export class AuthService {
  private readonly secret: string;

  constructor(secret: string = config.auth.jwtSecret) {
    this.secret = secret;
  }

  verifyToken(token: string): Actor {
    if (!this.secret) {
      throw new UnauthorizedError('Token verification is not configured (JWT_SECRET is empty)');
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret);
    } catch {
      throw new UnauthorizedError('Invalid or expired token');
    }

    if (typeof payload === 'string' || !payload.sub) {
      throw new UnauthorizedError('Token has no subject');
    }
    const role = parseRole(payload.role);
    if (!role) {
      throw new UnauthorizedError('Token has no valid role claim');
    }

    const name = typeof payload.name === 'string' && payload.name.trim() ? payload.name.trim() : payload.sub;
    return { userId: payload.sub, displayName: name, role };
  }

  /** Sign a token the way the identity provider does. Local tooling and tests. */
  issueToken(actor: Actor, expiresInSeconds: number = DEFAULT_EXPIRES_IN_SECONDS): string {
    return jwt.sign({ name: actor.displayName, role: actor.role }, this.secret, {
      subject: actor.userId,
      expiresIn: expiresInSeconds,
    });
  }
}

export const authService = new AuthService();
