export * from './staff.model';
export * from './one-time-passcode.model';
export * from './it-issue.model';
