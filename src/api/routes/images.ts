/**
 * Images API Routes
 *
 * Routes (relative to mount point /api):
 * - DELETE /images/:id/  delete one image and its blob
 *
 * Uploads live under /resources/:id/images/ since an image needs its owner.
 */

import { Hono } from 'hono';
import type { ApiDependencies } from '../types';
import { parseId } from '../utils/request';
import { noContent, notFound } from '../utils/response';

export function imagesRoutes(deps: Pick<ApiDependencies, 'images'>): Hono {
  const router = new Hono();

  router.delete('/images/:id/', async (c) => {
    const id = parseId(c.req.param('id'));
    if (id === null) {
      return notFound(c);
    }

    await deps.images.delete(id);
    return noContent(c);
  });

  return router;
}
