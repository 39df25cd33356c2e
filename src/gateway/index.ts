export {
  Gateway,
  createServices,
  setupGracefulShutdown,
  type GatewayOptions,
  type Services,
  type ServiceOverrides,
} from './gateway.js';
