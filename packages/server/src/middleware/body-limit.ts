/**
 * Global Body Limit Middleware
 *
 * Billing requests and provider webhooks are small JSON documents; anything
 * larger than 256KB is refused before it is read.
 */

import { bodyLimit } from 'hono/body-limit';

export const MAX_BODY_BYTES = 256 * 1024;

export const apiBodyLimit = bodyLimit({
  maxSize: MAX_BODY_BYTES,
  onError: (c) => {
    return c.json({ error: 'Request body too large', status: 413, maxSize: '256KB' }, 413);
  },
});
