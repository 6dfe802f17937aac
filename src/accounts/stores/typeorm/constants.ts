export const ACCOUNTS_TYPEORM_CONNECTION_NAME = 'github-activity-accounts';

export const ACCOUNTS_TABLE_PREFIX = 'gha_';
