import { Router } from 'express';
import { GatewayController } from '../controllers/gateway.controller';
import { asyncHandler } from '../middleware/error.middleware';
import { enforceUploadSize, parseSubmission } from '../middleware/upload.middleware';
import { UploadConfig } from '../types/config.types';

/**
 * Gateway routes
 */
export function createGatewayRouter(controller: GatewayController, upload: UploadConfig): Router {
  const router = Router();

  /**
   * GET /
   * Login form; ?list_files=1&proposal=<id> lists stored files
   */
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      await controller.handle(req, res);
    })
  );

  /**
   * POST /
   * Multipart form with action flags: login, logout, check, upload, list_files
   *
   * Response:
   * - 200: Rendered page (including validation reports and login failures)
   * - 400: Missing or malformed field
   * - 413: Upload too large
   */
  router.post(
    '/',
    enforceUploadSize(upload),
    parseSubmission(upload),
    asyncHandler(async (req, res) => {
      await controller.handle(req, res);
    })
  );

  /**
   * GET /health
   * Health check endpoint (no authentication required)
   */
  router.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  return router;
}
