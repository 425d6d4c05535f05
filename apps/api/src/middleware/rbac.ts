import type { NextFunction, Request, RequestHandler, Response } from 'express';
import {
  ROLE_PERMISSIONS,
  UnauthorizedError,
  type ClockPort,
  type OperationContext,
  type Permission,
  type UserDirectoryPort,
  type UserRole,
} from '@rentdesk/domain';

export interface AuthContext {
  userId: string;
  displayName: string;
  role: UserRole;
  permissions: Set<Permission>;
}

const FALLBACK_CONTEXT: AuthContext = {
  userId: 'system-admin',
  displayName: 'System Admin',
  role: 'admin',
  permissions: new Set(ROLE_PERMISSIONS.admin),
};

declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

export interface RbacOptions {
  /** Treat requests without x-user-id as the system admin. */
  devFallback: boolean;
}

export interface Rbac {
  ensureAuthContext(req: Request): Promise<AuthContext>;
  requirePermission(permission: Permission): RequestHandler;
}

export function createRbac(directory: UserDirectoryPort, options: RbacOptions): Rbac {
  async function ensureAuthContext(req: Request): Promise<AuthContext> {
    if (req.authContext) return req.authContext;

    const headerUserId = req.header('x-user-id')?.trim();
    if (!headerUserId) {
      if (!options.devFallback) throw new UnauthorizedError('missing x-user-id header');
      req.authContext = FALLBACK_CONTEXT;
      return FALLBACK_CONTEXT;
    }

    const user = await directory.findActiveUser(headerUserId);
    if (!user) throw new UnauthorizedError();

    const context: AuthContext = {
      userId: user.id,
      displayName: user.fullName,
      role: user.role,
      permissions: new Set(ROLE_PERMISSIONS[user.role]),
    };
    req.authContext = context;
    return context;
  }

  function requirePermission(permission: Permission): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const context = await ensureAuthContext(req);
        if (!context.permissions.has(permission)) {
          res.status(403).json({
            error: 'forbidden',
            requiredPermission: permission,
            userId: context.userId,
            role: context.role,
          });
          return;
        }
        next();
      } catch (err) {
        next(err);
      }
    };
  }

  return { ensureAuthContext, requirePermission };
}

export function getActorId(req: Request, fallback = 'system-admin'): string {
  return req.authContext?.userId ?? fallback;
}

/** Actor and business day for one request. */
export function operationContext(req: Request, clock: ClockPort): OperationContext {
  return { actorId: getActorId(req), today: clock.today() };
}
