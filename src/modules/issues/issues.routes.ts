import express, { RequestHandler } from 'express';
import { IssueController } from './issues.controller';
import { createIssueUpload } from './issues.upload';
import { requireRole } from '../../middlewares/auth.middleware';
import { asyncHandler } from '../../middlewares/error.middleware';
import { STAFF_ROLE } from '../../constants';

export const createIssueRoutes = (
  controller: IssueController,
  authenticate: RequestHandler,
  maxFileSize: number
) => {
  const router = express.Router();
  const upload = createIssueUpload(maxFileSize);

  // Public
  router.get('/categories', asyncHandler(controller.categories));

  router.use(authenticate);

  router.get('/', asyncHandler(controller.list));
  router.post('/', upload, asyncHandler(controller.create));

  // Support queue, declared before /:id
  router.get(
    '/all',
    requireRole(STAFF_ROLE.SUPPORT, STAFF_ROLE.ADMIN),
    asyncHandler(controller.listAll)
  );

  router.get('/:id', asyncHandler(controller.get));
  router.put('/:id', upload, asyncHandler(controller.update));
  router.patch('/:id', upload, asyncHandler(controller.update));
  router.delete('/:id', asyncHandler(controller.delete));

  return router;
};
