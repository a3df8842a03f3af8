import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { getDb } from '../database/connection';
import { getConfig } from '../config';
import { USER_ROLES } from '../../shared/constants';
import type { User, UserRole } from '../../shared/types';
import { AuthenticationError } from '../lib/errors';
import { toPublicUser, PublicUser } from './masters.service';

export interface LoginInput {
  email: string;
  password: string;
}

export interface JwtPayload {
  userId: string;
  role: UserRole;
  email: string;
}

const ROLES: ReadonlySet<string> = new Set(Object.values(USER_ROLES));

function isJwtPayload(value: unknown): value is JwtPayload {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'userId' in value &&
    typeof value.userId === 'string' &&
    'role' in value &&
    typeof value.role === 'string' &&
    ROLES.has(value.role) &&
    'email' in value &&
    typeof value.email === 'string'
  );
}

export class AuthService {
  async login(input: LoginInput): Promise<{ token: string; user: PublicUser }> {
    const db = getDb();
    const user: User | undefined = await db('users').where({ email: input.email, role: 'owner' }).first();
    if (!user || !user.password_hash) throw new AuthenticationError('Invalid email or password');

    const isValid = await bcrypt.compare(input.password, user.password_hash);
    if (!isValid) throw new AuthenticationError('Invalid email or password');

    return { token: this.signToken(user), user: toPublicUser(user) };
  }

  signToken(user: Pick<User, 'id' | 'role' | 'email'>): string {
    const { JWT_SECRET, JWT_EXPIRES_IN_SECONDS } = getConfig();
    const payload: JwtPayload = { userId: user.id, role: user.role, email: user.email ?? '' };
    return jwt.sign(payload, JWT_SECRET, { expiresIn: JWT_EXPIRES_IN_SECONDS });
  }

  verifyToken(token: string): JwtPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, getConfig().JWT_SECRET);
    } catch {
      throw new AuthenticationError('Invalid or expired token');
    }
    if (!isJwtPayload(decoded)) throw new AuthenticationError('Malformed token');
    return { userId: decoded.userId, role: decoded.role, email: decoded.email };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, 12);
  }
}

export const authService = new AuthService();
