import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createClerkClient, verifyToken } from '@clerk/backend';
import { isAuthRole, type AuthConfig, type AuthRole } from './config';
import { buildResponseMetadata } from './metadata';

export interface AuthContext {
  tenantId: string;
  userId: string;
  actorId: string;
  role: AuthRole;
  organizationId?: string;
}

export type AuthResolver = (req: Request) => Promise<AuthContext | null>;

function getTokenFromRequest(req: Request): string | null {
  const header = req.header('authorization') || '';
  if (header.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim() || null;
  }

  const tokenParam = req.query.token ?? req.query.access_token;
  if (typeof tokenParam === 'string' && tokenParam.trim()) {
    return tokenParam.trim();
  }

  return null;
}

/**
 * Verifies a Clerk session JWT. The organisation claim scopes the tenant; users without
 * an active organisation are their own tenant.
 */
async function resolveClerkAuth(token: string, secretKey: string): Promise<AuthContext | null> {
  try {
    const decoded = await verifyToken(token, { secretKey });
    if (!decoded.sub) {
      return null;
    }

    const clerk = createClerkClient({ secretKey });
    const user = await clerk.users.getUser(decoded.sub);
    const role = isAuthRole(user.publicMetadata.role) ? user.publicMetadata.role : 'PROVIDER';
    const organizationId = typeof decoded.org_id === 'string' ? decoded.org_id : undefined;

    return {
      tenantId: organizationId ?? user.id,
      userId: user.id,
      actorId: user.id,
      role,
      organizationId,
    };
  } catch (error) {
    console.error('[AUTH] Clerk verification failed:', error);
    return null;
  }
}

function resolveTestAuth(token: string, req: Request, config: AuthConfig): AuthContext | null {
  const testAuth = config.testAuth;
  if (!testAuth || token !== testAuth.token) {
    return null;
  }

  const requestedTenant = req.header('x-tenant-id')?.trim();
  return {
    tenantId: requestedTenant || testAuth.tenantId,
    userId: testAuth.userId,
    actorId: testAuth.userId,
    role: testAuth.role,
    organizationId: testAuth.organizationId,
  };
}

export function createAuthResolver(config: AuthConfig): AuthResolver {
  return async (req) => {
    const token = getTokenFromRequest(req);
    if (!token) {
      return null;
    }

    const testAuth = resolveTestAuth(token, req, config);
    if (testAuth) {
      return testAuth;
    }

    if (!config.clerkSecretKey) {
      return null;
    }
    const clerkAuth = await resolveClerkAuth(token, config.clerkSecretKey);
    if (clerkAuth?.role === 'ADMIN') {
      const requestedTenant = req.header('x-tenant-id')?.trim();
      if (requestedTenant) {
        clerkAuth.tenantId = requestedTenant;
      }
    }
    return clerkAuth;
  };
}

export function createAuthMiddleware(resolve: AuthResolver, apiVersion: string): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const context = await resolve(req);
      if (!context) {
        res.status(401).json({
          ...buildResponseMetadata({ apiVersion }),
          error: 'Unauthorized: Invalid or missing authentication token',
        });
        return;
      }

      req.auth = context;
      next();
    } catch (error) {
      next(error);
    }
  };
}
