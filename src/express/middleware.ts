import type { Request, Response, NextFunction } from 'express';
import type { AuthSession } from '../core/auth-session.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

/**
 * The part of an auth session the role guard reads.
 */
export type RoleSource<Role> = Pick<AuthSession<Role>, 'loggedIn' | 'hasAnyRole'>;

/**
 * Options for the role guard middleware.
 */
export interface RequireRoleOptions {
  /** Logger instance */
  logger?: Logger;
}

/**
 * Create an Express middleware that only lets requests through while the
 * session holds one of the allowed roles.
 *
 * Responds 401 when the session is logged out and 403 when the current
 * role is not allowed.
 *
 * @param session - The auth session to check
 * @param allowed - Roles that are granted access
 * @param options - Middleware options
 * @returns Express middleware function
 *
 * @example
 * ```typescript
 * app.delete('/courses/:id', requireRole(session, ['admin', 'teacher']), deleteCourse);
 * ```
 */
export function requireRole<Role>(
  session: RoleSource<Role>,
  allowed: Iterable<Role>,
  options?: RequireRoleOptions
): (req: Request, res: Response, next: NextFunction) => void {
  const logger = options?.logger ?? noopLogger;
  const allowedRoles = [...allowed];

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!session.loggedIn) {
      res.status(401).json({
        error: 'unauthorized',
        message: 'Not logged in',
      });
      return;
    }

    if (!session.hasAnyRole(allowedRoles)) {
      logger.debug('Role not allowed for route', { path: req.path });
      res.status(403).json({
        error: 'forbidden',
        message: 'Current role is not allowed to access this resource',
      });
      return;
    }

    next();
  };
}
