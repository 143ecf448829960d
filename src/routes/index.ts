import express, { RequestHandler } from 'express';
import { AppContext } from '../context';
import { createStaffController } from '../modules/staff/staff.controller';
import { createStaffRoutes } from '../modules/staff/staff.routes';
import { createIssueController } from '../modules/issues/issues.controller';
import { createIssueRoutes } from '../modules/issues/issues.routes';

export const createApiRoutes = (ctx: AppContext, authenticate: RequestHandler) => {
  const router = express.Router();

  // API Routes
  router.use('/staff', createStaffRoutes(createStaffController(ctx.staffService), authenticate));
  router.use(
    '/issues',
    createIssueRoutes(createIssueController(ctx.issueService), authenticate, ctx.config.maxFileSize)
  );

  return router;
};
