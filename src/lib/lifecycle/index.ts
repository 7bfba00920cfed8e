export {
  LifecycleInvoker,
  declareLifecycleHooks,
  describeTarget,
  resolveLifecycleHooks,
  type LifecycleHook,
  type LifecycleHookDeclaration,
  type LifecycleHookTable,
  type MethodKeys,
} from './lifecycle-invoker';
export * from './phases';
