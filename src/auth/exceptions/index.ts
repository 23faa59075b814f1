export * from './token.exceptions';
export * from './role-denied.exception';
export * from './invalid-credentials.exception';
