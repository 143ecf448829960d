import { IssuePage, IssueRepository } from '../../src/modules/issues/issues.repository';
import { CreateItIssueInput, ItIssue, ItIssueFilter, UpdateItIssueInput } from '../../src/connections/db/models';
import { ISSUE_STATUS, IssueStatus } from '../../src/constants';

export class InMemoryIssueRepository implements IssueRepository {
  readonly issues: ItIssue[] = [];
  private nextId = 1;

  async create(input: CreateItIssueInput): Promise<ItIssue> {
    const now = new Date();
    const issue: ItIssue = {
      id: this.nextId++,
      owner_id: input.owner_id,
      title: input.title,
      description: input.description,
      category: input.category,
      priority: input.priority,
      method_of_logging: input.method_of_logging,
      attachment: input.attachment ?? null,
      status: ISSUE_STATUS.OPEN,
      work_done: null,
      recommendation: null,
      resolved_at: null,
      created_at: now,
      updated_at: now,
    };
    this.issues.push(issue);
    return { ...issue };
  }

  async findById(id: number): Promise<ItIssue | null> {
    const found = this.issues.find(i => i.id === id);
    return found ? { ...found } : null;
  }

  async list(filter: ItIssueFilter): Promise<IssuePage> {
    const matching = this.issues
      .filter(i => (filter.owner_id === undefined || i.owner_id === filter.owner_id))
      .filter(i => (filter.status === undefined || i.status === filter.status))
      .sort((a, b) => b.id - a.id);
    return {
      rows: matching.slice(filter.offset, filter.offset + filter.limit).map(i => ({ ...i })),
      total: matching.length,
    };
  }

  async update(id: number, changes: UpdateItIssueInput, expectedStatus: IssueStatus): Promise<ItIssue | null> {
    const found = this.issues.find(i => i.id === id && i.status === expectedStatus);
    if (!found) {
      return null;
    }
    if (changes.title !== undefined) found.title = changes.title;
    if (changes.description !== undefined) found.description = changes.description;
    if (changes.category !== undefined) found.category = changes.category;
    if (changes.priority !== undefined) found.priority = changes.priority;
    if (changes.method_of_logging !== undefined) found.method_of_logging = changes.method_of_logging;
    if (changes.attachment !== undefined) found.attachment = changes.attachment;
    if (changes.status !== undefined) found.status = changes.status;
    if (changes.work_done !== undefined) found.work_done = changes.work_done;
    if (changes.recommendation !== undefined) found.recommendation = changes.recommendation;
    if (changes.resolved_at !== undefined) found.resolved_at = changes.resolved_at;
    found.updated_at = new Date();
    return { ...found };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.issues.findIndex(i => i.id === id);
    if (index === -1) {
      return false;
    }
    this.issues.splice(index, 1);
    return true;
  }
}
