export * from './user.interface';
export * from './role.interface';
export * from './revoked-token.interface';
export * from './session.interface';
