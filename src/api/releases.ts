/**
 * Release API routes.
 *
 * GET  /releases                  List published versions
 * GET  /releases/:version         Get a published manifest
 * POST /releases                  Build and publish a release
 * GET  /releases/:version/verify  Re-hash a published release
 */

import { Router } from 'express';
import { apiError, createTypedError } from '../domain/errors';
import { ReleasePipeline } from '../engine/pipeline';
import { validateVersionTag } from '../engine/release-publisher';
import { ReleaseSink } from '../storage/store';

function notFound(version: string) {
  return apiError(createTypedError({
    code: 'RELEASE.NOT_FOUND',
    message: `Release "${version}" has not been published`,
    details: { version },
  }));
}

export function createReleaseRoutes(pipeline: ReleasePipeline, sink: ReleaseSink): Router {
  const router = Router();

  router.get('/releases', async (_req, res, next) => {
    try {
      res.json({ versions: await sink.listVersions() });
    } catch (err) {
      next(err);
    }
  });

  router.get('/releases/:version', async (req, res, next) => {
    try {
      validateVersionTag(req.params.version);
      const manifest = await sink.getManifest(req.params.version);
      if (!manifest) {
        res.status(404).json(notFound(req.params.version));
        return;
      }
      res.json({ manifest });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /releases
   * Body: { version, selector? }. Runs the whole pipeline before answering:
   * 201 published, 200 identical content already published, 409 version
   * conflict, 422 blocked by a required variant or a selector that leaves
   * one out, 400 for a malformed body or version tag.
   */
  router.post('/releases', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const version = typeof body === 'object' && body !== null && 'version' in body ? body.version : undefined;
      const selector = typeof body === 'object' && body !== null && 'selector' in body ? body.selector : undefined;
      if (typeof version !== 'string' || (selector !== undefined && typeof selector !== 'string')) {
        res.status(400).json(apiError(createTypedError({
          code: 'VALIDATION.INVALID_BODY',
          message: 'Body must be {"version": string, "selector"?: string}',
        })));
        return;
      }

      const { report } = await pipeline.release(version, selector);
      switch (report.publication.kind) {
        case 'published':
          res.status(201).json({ report });
          return;
        case 'unchanged':
          res.status(200).json({ report });
          return;
        case 'conflict':
          res.status(409).json({ ...apiError(report.publication.error), report });
          return;
        case 'blocked':
          res.status(422).json({
            ...apiError(createTypedError({
              code: 'RELEASE.BLOCKED',
              message: `Required variant(s) failed: ${report.publication.blockedBy.join(', ')}`,
              retryable: true,
              details: { blockedBy: report.publication.blockedBy },
            })),
            report,
          });
          return;
        case 'skipped':
          res.status(500).json({ report });
          return;
      }
    } catch (err) {
      next(err);
    }
  });

  router.get('/releases/:version/verify', async (req, res, next) => {
    try {
      const verification = await pipeline.verifyRelease(req.params.version);
      if (!verification.found) {
        res.status(404).json(notFound(req.params.version));
        return;
      }
      res.json({ verification });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
