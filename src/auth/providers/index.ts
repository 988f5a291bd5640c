export { NoAuthProvider } from './no-auth';
export { BasicAuthProvider } from './basic-auth';
export { BearerTokenProvider } from './bearer-token';
