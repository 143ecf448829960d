import { z } from 'zod';
import {
  ISSUE_CATEGORIES,
  ISSUE_PRIORITIES,
  ISSUE_STATUSES,
  LOGGING_METHODS,
} from '../../constants';

const titleField = z.string().trim().min(1, 'Title is required').max(200, 'Title must be at most 200 characters');
const descriptionField = z.string().trim().min(1, 'Description is required');
const notesField = z.string().trim().max(5000).nullable();

export const createIssueSchema = z.object({
  title: titleField,
  description: descriptionField,
  category: z.enum(ISSUE_CATEGORIES),
  priority: z.enum(ISSUE_PRIORITIES),
  method_of_logging: z.enum(LOGGING_METHODS),
});

// Multipart bodies arrive as strings, so an empty notes field clears the value
export const updateIssueSchema = z.object({
  title: titleField.optional(),
  description: descriptionField.optional(),
  category: z.enum(ISSUE_CATEGORIES).optional(),
  priority: z.enum(ISSUE_PRIORITIES).optional(),
  method_of_logging: z.enum(LOGGING_METHODS).optional(),
  status: z.enum(ISSUE_STATUSES).optional(),
  work_done: z.preprocess(value => (value === '' ? null : value), notesField.optional()),
  recommendation: z.preprocess(value => (value === '' ? null : value), notesField.optional()),
});

export const listIssuesQuerySchema = z.object({
  owner_id: z.string().uuid('Invalid owner id').optional(),
  status: z.enum(ISSUE_STATUSES).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const issueIdParamSchema = z.object({
  id: z.coerce.number().int().positive('Invalid issue id'),
});
