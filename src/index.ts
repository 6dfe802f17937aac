export * from './github-activity.module';
export * from './interfaces/module-options.interface';
export * from './config/configuration';

export * from './common/constants';
export * from './common/errors/github-activity.errors';
export * from './common/filters/api-exception.filter';
export * from './common/pipes/zod-validation.pipe';
export * from './common/responses/success-response';
export * from './common/utils/fan-out';
export * from './common/utils/logger.factory';

export * from './accounts/interfaces/user-account.interface';
export * from './accounts/interfaces/credential-store.interface';
export * from './accounts/services/user-account.service';
export * from './accounts/stores/memory-credential.store';
export * from './accounts/stores/typeorm/typeorm-credential.store';
export * from './accounts/stores/typeorm/user-account.entity';

export * from './auth/interfaces/oauth-common.interface';
export * from './auth/providers/github.provider';
export * from './auth/guards/session-auth.guard';
export * from './auth/services/oauth-flow.service';
export * from './auth/services/session-token.service';
export * from './auth/services/token-cipher.service';
export * from './auth/stores/oauth-state-store.interface';
export * from './auth/stores/memory-oauth-state.store';

export * from './activity/interfaces/activity-query.interface';
export * from './activity/interfaces/github-resources';
export * from './activity/services/github-api.client';
export * from './activity/services/activity-aggregator.service';
