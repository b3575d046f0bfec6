export {
  setupServiceShutdown,
  runServiceMain,
} from './service-bootstrap';
export type {
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  RunServiceMainConfig,
} from './service-bootstrap';
