import { Response } from 'express';
import { IssueService } from './issues.service';
import {
  createIssueSchema,
  issueIdParamSchema,
  listIssuesQuerySchema,
  updateIssueSchema,
} from './issues.validation';
import { Staff } from '../../connections/db/models';
import { StoredFileInput } from '../upload/localStorage.service';
import { AuthRequest } from '../../types/request.types';
import { AuthenticationError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';

const currentStaff = (req: AuthRequest): Staff => {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
};

const uploadedFile = (req: AuthRequest): StoredFileInput | undefined =>
  req.file ? { buffer: req.file.buffer, originalName: req.file.originalname } : undefined;

export const createIssueController = (issueService: IssueService) => ({
  // GET /issues/categories
  categories: async (_req: AuthRequest, res: Response) => {
    return ResponseHandler.success(res, issueService.categories());
  },

  // POST /issues
  create: async (req: AuthRequest, res: Response) => {
    const fields = createIssueSchema.parse(req.body);
    const issue = await issueService.create(currentStaff(req), fields, uploadedFile(req));

    return ResponseHandler.created(res, issue, 'Issue logged.');
  },

  // GET /issues
  list: async (req: AuthRequest, res: Response) => {
    const query = listIssuesQuerySchema.parse(req.query);
    const { rows, total } = await issueService.list(currentStaff(req), query);

    return ResponseHandler.paginated(res, rows, { page: query.page, limit: query.limit, total });
  },

  // GET /issues/all
  listAll: async (req: AuthRequest, res: Response) => {
    const { status, page, limit } = listIssuesQuerySchema.parse(req.query);
    const { rows, total } = await issueService.listAll(currentStaff(req), { status, page, limit });

    return ResponseHandler.paginated(res, rows, { page, limit, total });
  },

  // GET /issues/:id
  get: async (req: AuthRequest, res: Response) => {
    const { id } = issueIdParamSchema.parse(req.params);
    const issue = await issueService.get(id, currentStaff(req));

    return ResponseHandler.success(res, issue);
  },

  // PUT|PATCH /issues/:id
  update: async (req: AuthRequest, res: Response) => {
    const { id } = issueIdParamSchema.parse(req.params);
    const fields = updateIssueSchema.parse(req.body);
    const issue = await issueService.update(id, currentStaff(req), fields, uploadedFile(req));

    return ResponseHandler.success(res, issue, 'Issue updated.');
  },

  // DELETE /issues/:id
  delete: async (req: AuthRequest, res: Response) => {
    const { id } = issueIdParamSchema.parse(req.params);
    await issueService.delete(id, currentStaff(req));

    return ResponseHandler.success(res, null, 'Issue deleted.');
  },
});

export type IssueController = ReturnType<typeof createIssueController>;
