import { IssuePage, IssueRepository } from './issues.repository';
import { StaffRepository } from '../staff/staff.repository';
import { AttachmentStorage, StoredFileInput } from '../upload/localStorage.service';
import { IssueNotice, IssueOwner, NotificationGateway } from '../notifications/notification.gateway';
import {
  ItIssue,
  ItIssueContentChanges,
  ItIssueStatusChanges,
  UpdateItIssueInput,
} from '../../connections/db/models';
import {
  ISSUE_CATEGORY_CHOICES,
  ISSUE_STATUS,
  IssueCategory,
  IssuePriority,
  IssueStatus,
  LoggingMethod,
  NOTIFICATION_KIND,
  NotificationKind,
  StaffRole,
  canTransition,
  isSupportRole,
} from '../../constants';
import {
  ForbiddenError,
  InvalidTransitionError,
  IssueLockedError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { auditLog, errorMeta, logger } from '../../utils/logging';

export type IssueRequester = IssueOwner & { role: StaffRole };

export interface CreateIssueFields {
  title: string;
  description: string;
  category: IssueCategory;
  priority: IssuePriority;
  method_of_logging: LoggingMethod;
}

export type UpdateIssueFields = Omit<ItIssueContentChanges, 'attachment'> & ItIssueStatusChanges;

export interface ListIssuesOptions {
  owner_id?: string;
  status?: IssueStatus;
  page: number;
  limit: number;
}

export type IssueNotifier = Pick<NotificationGateway, 'notify'>;

const CONTENT_FIELDS = ['title', 'description', 'category', 'priority', 'method_of_logging'] as const;
const STATUS_FIELDS = ['status', 'work_done', 'recommendation'] as const;

/**
 * IT issue lifecycle. Owners edit the content of their own open issues;
 * support staff move issues along open -> in_progress -> resolved.
 */
export class IssueService {
  private readonly now: () => Date;

  constructor(
    private readonly issueRepository: IssueRepository,
    private readonly staffRepository: StaffRepository,
    private readonly storage: AttachmentStorage,
    private readonly notifier: IssueNotifier,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  categories(): typeof ISSUE_CATEGORY_CHOICES {
    return ISSUE_CATEGORY_CHOICES;
  }

  async create(owner: IssueOwner, fields: CreateIssueFields, attachment?: StoredFileInput): Promise<ItIssue> {
    const attachmentPath = attachment ? await this.storage.save(attachment) : null;

    let issue: ItIssue;
    try {
      issue = await this.issueRepository.create({
        owner_id: owner.id,
        title: fields.title,
        description: fields.description,
        category: fields.category,
        priority: fields.priority,
        method_of_logging: fields.method_of_logging,
        attachment: attachmentPath,
      });
    } catch (error) {
      if (attachmentPath) {
        await this.storage.remove(attachmentPath);
      }
      throw error;
    }

    auditLog('ISSUE_CREATED', { issueId: issue.id, ownerId: owner.id, category: issue.category });
    this.dispatch({ kind: NOTIFICATION_KIND.CREATED, issue, owner });
    return issue;
  }

  async list(requester: IssueRequester, options: ListIssuesOptions): Promise<IssuePage> {
    const ownerId = options.owner_id ?? requester.id;

    if (ownerId !== requester.id && !isSupportRole(requester.role)) {
      throw new ForbiddenError('You can only list your own issues');
    }

    return this.issueRepository.list({
      owner_id: ownerId,
      status: options.status,
      limit: options.limit,
      offset: (options.page - 1) * options.limit,
    });
  }

  async listAll(requester: IssueRequester, options: Omit<ListIssuesOptions, 'owner_id'>): Promise<IssuePage> {
    if (!isSupportRole(requester.role)) {
      throw new ForbiddenError('Only IT support can view the issue queue');
    }

    return this.issueRepository.list({
      status: options.status,
      limit: options.limit,
      offset: (options.page - 1) * options.limit,
    });
  }

  async get(id: number, requester: IssueRequester): Promise<ItIssue> {
    const issue = await this.requireIssue(id);

    if (issue.owner_id !== requester.id && !isSupportRole(requester.role)) {
      throw new ForbiddenError('You do not have access to this issue');
    }
    return issue;
  }

  async update(
    id: number,
    requester: IssueRequester,
    fields: UpdateIssueFields,
    attachment?: StoredFileInput
  ): Promise<ItIssue> {
    const issue = await this.requireIssue(id);

    const touchesContent = CONTENT_FIELDS.some(field => fields[field] !== undefined) || attachment !== undefined;
    const touchesStatus = STATUS_FIELDS.some(field => fields[field] !== undefined);

    if (!touchesContent && !touchesStatus) {
      throw new ValidationError('No changes supplied');
    }

    if (touchesStatus && !isSupportRole(requester.role)) {
      throw new ForbiddenError('Only IT support can change the status of an issue');
    }

    if (touchesContent) {
      if (issue.owner_id !== requester.id) {
        throw new ForbiddenError('Only the owner can edit an issue');
      }
      if (issue.status !== ISSUE_STATUS.OPEN) {
        throw new IssueLockedError(issue.status);
      }
    }

    if (fields.status !== undefined && !canTransition(issue.status, fields.status)) {
      throw new InvalidTransitionError(issue.status, fields.status);
    }

    const changes: UpdateItIssueInput = {
      title: fields.title,
      description: fields.description,
      category: fields.category,
      priority: fields.priority,
      method_of_logging: fields.method_of_logging,
      status: fields.status,
      work_done: fields.work_done,
      recommendation: fields.recommendation,
    };
    if (fields.status === ISSUE_STATUS.RESOLVED) {
      changes.resolved_at = this.now();
    }
    if (attachment) {
      changes.attachment = await this.storage.save(attachment);
    }

    const updated = await this.issueRepository.update(id, changes, issue.status);
    if (!updated) {
      if (changes.attachment) {
        await this.storage.remove(changes.attachment);
      }
      throw await this.describeLostUpdate(id, fields.status);
    }

    if (changes.attachment && issue.attachment) {
      await this.storage.remove(issue.attachment);
    }

    // Notes added to an already resolved issue are an ordinary update
    const kind: NotificationKind =
      fields.status === ISSUE_STATUS.RESOLVED
        ? NOTIFICATION_KIND.RESOLVED
        : NOTIFICATION_KIND.UPDATED;

    auditLog('ISSUE_UPDATED', {
      issueId: id,
      requesterId: requester.id,
      from: issue.status,
      to: updated.status,
      kind,
    });

    const owner = updated.owner_id === requester.id
      ? requester
      : await this.staffRepository.findById(updated.owner_id);
    if (owner) {
      this.dispatch({ kind, issue: updated, owner });
    } else {
      logger.warn('[Issues] Owner missing, notification skipped', { issueId: id });
    }

    return updated;
  }

  async delete(id: number, requester: IssueRequester): Promise<void> {
    const issue = await this.requireIssue(id);

    if (issue.owner_id !== requester.id) {
      throw new ForbiddenError('Only the owner can delete an issue');
    }

    const deleted = await this.issueRepository.delete(id);
    if (!deleted) {
      throw new NotFoundError('Issue');
    }

    if (issue.attachment) {
      await this.storage.remove(issue.attachment);
    }

    auditLog('ISSUE_DELETED', { issueId: id, ownerId: requester.id });
  }

  private async requireIssue(id: number): Promise<ItIssue> {
    const issue = await this.issueRepository.findById(id);
    if (!issue) {
      throw new NotFoundError('Issue');
    }
    return issue;
  }

  /**
   * Another request changed the issue between our read and our write
   */
  private async describeLostUpdate(id: number, targetStatus?: IssueStatus): Promise<Error> {
    const current = await this.issueRepository.findById(id);
    if (!current) {
      return new NotFoundError('Issue');
    }
    return targetStatus !== undefined
      ? new InvalidTransitionError(current.status, targetStatus)
      : new IssueLockedError(current.status);
  }

  private dispatch(notice: IssueNotice): void {
    this.notifier.notify(notice).catch(error => {
      logger.error('[Issues] Notification dispatch failed', {
        issueId: notice.issue.id,
        kind: notice.kind,
        ...errorMeta(error),
      });
    });
  }
}
