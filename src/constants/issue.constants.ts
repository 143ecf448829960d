/**
 * IT Issue Status Constants
 */
export const ISSUE_STATUS = {
  OPEN: 'open',
  IN_PROGRESS: 'in_progress',
  RESOLVED: 'resolved',
} as const;

export type IssueStatus = typeof ISSUE_STATUS[keyof typeof ISSUE_STATUS];

export const ISSUE_STATUSES = [ISSUE_STATUS.OPEN, ISSUE_STATUS.IN_PROGRESS, ISSUE_STATUS.RESOLVED] as const;

/**
 * Allowed status moves. Resolved is terminal.
 */
export const ISSUE_TRANSITIONS: Record<IssueStatus, readonly IssueStatus[]> = {
  open: [ISSUE_STATUS.IN_PROGRESS, ISSUE_STATUS.RESOLVED],
  in_progress: [ISSUE_STATUS.RESOLVED],
  resolved: [],
};

export const canTransition = (from: IssueStatus, to: IssueStatus): boolean =>
  ISSUE_TRANSITIONS[from].includes(to);

/**
 * IT Issue Priority Constants
 */
export const ISSUE_PRIORITY = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
} as const;

export type IssuePriority = typeof ISSUE_PRIORITY[keyof typeof ISSUE_PRIORITY];

export const ISSUE_PRIORITIES = [ISSUE_PRIORITY.LOW, ISSUE_PRIORITY.MEDIUM, ISSUE_PRIORITY.HIGH] as const;

/**
 * How the issue reached IT
 */
export const LOGGING_METHOD = {
  EMAIL: 'email',
  CALL: 'call',
  WALK_IN: 'walk_in',
} as const;

export type LoggingMethod = typeof LOGGING_METHOD[keyof typeof LOGGING_METHOD];

export const LOGGING_METHODS = [LOGGING_METHOD.EMAIL, LOGGING_METHOD.CALL, LOGGING_METHOD.WALK_IN] as const;

/**
 * IT Issue Categories
 */
export const ISSUE_CATEGORIES = [
  'internet_banking',
  'mobile_banking',
  'br_net',
  'network',
  'hardware',
  'software',
  'others',
] as const;

export type IssueCategory = typeof ISSUE_CATEGORIES[number];

export const ISSUE_CATEGORY_LABELS: Record<IssueCategory, string> = {
  internet_banking: 'Internet Banking',
  mobile_banking: 'Mobile Banking',
  br_net: 'BR. NET',
  network: 'Network Issue',
  hardware: 'Hardware Issue',
  software: 'Software Issue',
  others: 'Others',
};

export const ISSUE_CATEGORY_CHOICES = ISSUE_CATEGORIES.map(id => ({
  id,
  name: ISSUE_CATEGORY_LABELS[id],
}));
