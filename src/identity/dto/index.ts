export * from './register-user.dto';
export * from './login.dto';
export * from './auth-response.dto';
export * from './role-request.dto';
export * from './role-ids.dto';
export * from './change-password.dto';
export * from './refresh-token.dto';
export * from './session.dto';
