export { StrategyDiscoveryService } from './strategy-discovery.service.js';
