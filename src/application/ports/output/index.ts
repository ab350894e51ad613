/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  type StorageClientHandle,
  type StorageClientFactory,
  type DownloadedObject,
} from './storage-client.port';
export { type StorageClientRegistryPort } from './storage-client-registry.port';
export { type ValidatorPort } from './validator.port';
export { type ScratchSpacePort } from './scratch-space.port';
