/**
 * Resources API Routes
 *
 * CRUD over resources plus image upload. Handlers pull the id and body out of
 * the request, hand them to a repository and serialize the result; missing
 * records and invalid fields surface as NotFoundError / ValidationError and
 * are turned into 404 / 400 by the error handler.
 *
 * Routes (relative to mount point /api):
 * - GET    /resources/             list, newest first
 * - POST   /resources/             create (JSON, urlencoded or multipart)
 * - GET    /resources/:id/         retrieve
 * - PUT    /resources/:id/         full update
 * - PATCH  /resources/:id/         partial update
 * - DELETE /resources/:id/         delete with images and blobs
 * - POST   /resources/:id/images/  upload an image (multipart)
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import type { ResourceFields } from '@/storage/repositories';
import { readValidatedBody } from '../middleware/body';
import {
  resolveMediaBaseUrl,
  serializeImage,
  serializeResource,
  serializeResources,
} from '../serializers';
import {
  imageUploadSchema,
  resourceFieldsSchema,
  type ApiDependencies,
  type ResourceFieldsBody,
} from '../types';
import { parseId, toUploadedFile } from '../utils/request';
import { noContent, notFound, success } from '../utils/response';

async function toResourceFields(body: ResourceFieldsBody): Promise<ResourceFields> {
  return {
    title: body.title,
    description: body.description,
    tags: body.tags,
    file: body.resource_file ? await toUploadedFile(body.resource_file) : body.resource_file,
  };
}

/**
 * Creates the resources router.
 *
 * @example
 * ```typescript
 * const api = new Hono();
 * api.route('/', resourcesRoutes({ resources, images, blobs, media: config.media }));
 * ```
 */
export function resourcesRoutes(deps: ApiDependencies): Hono {
  const router = new Hono();
  const { resources, images, media } = deps;

  const mediaBaseUrl = (c: Context): string => resolveMediaBaseUrl(media, c.req.url);

  router.get('/resources/', async (c) => {
    const list = await resources.findAll();
    return success(c, serializeResources(list, mediaBaseUrl(c)));
  });

  router.post('/resources/', async (c) => {
    const body = await readValidatedBody(c, resourceFieldsSchema);
    const created = await resources.create(await toResourceFields(body));

    return success(c, serializeResource(created, mediaBaseUrl(c)), 201);
  });

  router.get('/resources/:id/', async (c) => {
    const id = parseId(c.req.param('id'));
    if (id === null) {
      return notFound(c);
    }

    const resource = await resources.findById(id);
    if (!resource) {
      return notFound(c);
    }

    return success(c, serializeResource(resource, mediaBaseUrl(c)));
  });

  /**
   * PUT replaces every writable field (omitted ones fall back to their
   * defaults, except the file); PATCH changes only what is supplied.
   * An unknown id is a 404 before the body is looked at.
   */
  const update = (partial: boolean) => async (c: Context) => {
    const id = parseId(c.req.param('id'));
    if (id === null) {
      return notFound(c);
    }

    if (!(await resources.findById(id))) {
      return notFound(c);
    }

    const body = await readValidatedBody(c, resourceFieldsSchema);
    const updated = await resources.update(id, await toResourceFields(body), { partial });

    return success(c, serializeResource(updated, mediaBaseUrl(c)));
  };

  router.put('/resources/:id/', update(false));
  router.patch('/resources/:id/', update(true));

  router.delete('/resources/:id/', async (c) => {
    const id = parseId(c.req.param('id'));
    if (id === null) {
      return notFound(c);
    }

    await resources.delete(id);
    return noContent(c);
  });

  /**
   * POST /resources/:id/images/
   *
   * The resource is looked up before the body is read, so an upload to an
   * unknown resource is a 404 whatever it carries.
   */
  router.post('/resources/:id/images/', async (c) => {
    const id = parseId(c.req.param('id'));
    if (id === null) {
      return notFound(c);
    }

    if (!(await resources.findById(id))) {
      return notFound(c);
    }

    const body = await readValidatedBody(c, imageUploadSchema);
    const image = await images.create({
      resourceId: id,
      image: body.image ? await toUploadedFile(body.image) : null,
      caption: body.caption,
    });

    return success(c, serializeImage(image, mediaBaseUrl(c)), 201);
  });

  return router;
}
