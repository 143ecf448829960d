// ItIssue Model - Based on migration 20251120_000003_create_it_issues_table

import { IssueCategory, IssuePriority, IssueStatus, LoggingMethod } from '../../../constants';

export interface ItIssue {
  id: number;
  owner_id: string; // UUID of the submitting staff member
  title: string;
  description: string;
  category: IssueCategory;
  priority: IssuePriority;
  method_of_logging: LoggingMethod;
  attachment: string | null; // path relative to the upload directory
  status: IssueStatus;
  work_done: string | null;
  recommendation: string | null;
  resolved_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateItIssueInput {
  owner_id: string;
  title: string;
  description: string;
  category: IssueCategory;
  priority: IssuePriority;
  method_of_logging: LoggingMethod;
  attachment?: string | null;
}

/**
 * Fields the owner may change while the issue is open
 */
export interface ItIssueContentChanges {
  title?: string;
  description?: string;
  category?: IssueCategory;
  priority?: IssuePriority;
  method_of_logging?: LoggingMethod;
  attachment?: string | null;
}

/**
 * Fields support staff change while working the issue
 */
export interface ItIssueStatusChanges {
  status?: IssueStatus;
  work_done?: string | null;
  recommendation?: string | null;
}

export type UpdateItIssueInput = ItIssueContentChanges & ItIssueStatusChanges & {
  resolved_at?: Date;
};

export interface ItIssueFilter {
  owner_id?: string;
  status?: IssueStatus;
  limit: number;
  offset: number;
}
