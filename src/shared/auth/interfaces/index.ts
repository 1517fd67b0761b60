export * from './jwt-payload.interface';
export * from './authenticated-user.interface';
export * from './principal-resolver.interface';
