export * from './types';
export { BaseControllerService } from './base-controller-service';
export {
  ServiceRegistry,
  type ServiceRegistryOptions,
} from './service-registry';
