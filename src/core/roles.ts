import type { RoleCodec, RoleMapper } from '../types.js';
import { parseIdentityJson } from './identity.js';

/**
 * Create a codec for roles modelled as a union of string literals.
 *
 * Roles are stored as JSON string literals (e.g. `"admin"`), so a stored
 * value that is not one of `values` deserializes to undefined.
 *
 * @param values - Every valid role
 * @param guest - The unauthenticated role; must be one of `values`
 *
 * @example
 * ```typescript
 * const courseRoles = ['admin', 'teacher', 'student', 'guest'] as const;
 * type CourseRole = (typeof courseRoles)[number];
 *
 * const codec = createEnumRoleCodec<CourseRole>(courseRoles, 'guest');
 * ```
 */
export function createEnumRoleCodec<Role extends string>(
  values: readonly Role[],
  guest: Role
): RoleCodec<Role> {
  if (!values.includes(guest)) {
    throw new Error(`Guest role "${guest}" is not one of the declared roles`);
  }

  const isRole = (value: unknown): value is Role =>
    typeof value === 'string' && values.some((role) => role === value);

  return {
    guest,

    equals(a: Role, b: Role): boolean {
      return a === b;
    },

    serialize(role: Role): string {
      return JSON.stringify(role);
    },

    deserialize(value: string): Role | undefined {
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        return undefined;
      }
      return isRole(parsed) ? parsed : undefined;
    },
  };
}

/**
 * Ready-made roles for applications that only distinguish administrators,
 * regular users and guests.
 */
export const DEFAULT_ROLES = ['admin', 'user', 'guest'] as const;

export type DefaultRole = (typeof DEFAULT_ROLES)[number];

export const defaultRoleCodec: RoleCodec<DefaultRole> = createEnumRoleCodec<DefaultRole>(
  DEFAULT_ROLES,
  'guest'
);

/**
 * Wrap a mapper over parsed JSON claims into a {@link RoleMapper}.
 * Identity bytes that are not JSON map to no role.
 *
 * @example
 * ```typescript
 * const mapper = createJsonRoleMapper<DefaultRole>((claims) => {
 *   if (typeof claims !== 'object' || claims === null || !('email' in claims)) return undefined;
 *   return String(claims.email).endsWith('@example.com') ? 'admin' : 'user';
 * });
 * ```
 */
export function createJsonRoleMapper<Role>(
  map: (claims: unknown) => Role | null | undefined
): RoleMapper<Role> {
  return (identity) => {
    const claims = parseIdentityJson(identity);
    return claims === undefined ? undefined : map(claims);
  };
}
