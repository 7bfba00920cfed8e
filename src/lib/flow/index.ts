export * from './mock-flow-file';
export * from './flow-file-queue';
export * from './provenance';
export * from './shared-session-state';
export { MockSession, type SessionOwner } from './mock-session';
export { MockSessionFactory } from './mock-session-factory';
