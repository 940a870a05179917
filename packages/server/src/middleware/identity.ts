/**
 * Identity middleware.
 *
 * The upstream gateway authenticates the caller and forwards the user id in
 * `X-User-Id`. The ledger only checks that the user exists.
 */

import { createMiddleware } from 'hono/factory';
import type { UserIdentity } from '@creditledger/core';
import type { UserDirectory } from '../db/user-directory.js';

export const USER_ID_HEADER = 'X-User-Id';

/**
 * Type augmentation for Hono context variables.
 */
export type IdentityVariables = {
  user: UserIdentity;
};

export function identityMiddleware(users: UserDirectory) {
  return createMiddleware<{ Variables: IdentityVariables }>(async (c, next) => {
    const userId = c.req.header(USER_ID_HEADER)?.trim();
    if (!userId) {
      return c.json(
        {
          error: 'Authentication required',
          hint: `The gateway must forward the caller in the '${USER_ID_HEADER}' header`,
          status: 401,
        },
        401,
      );
    }

    const user = await users.findById(userId);
    if (!user) {
      return c.json({ error: `User ${userId} not found`, code: 'not_found', status: 404 }, 404);
    }

    c.set('user', user);
    return next();
  });
}
