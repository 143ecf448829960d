export * from './staff.constants';
export * from './otp.constants';
export * from './issue.constants';
export * from './notification.constants';
