export * from './types/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './infra/index.js';
export * from './core/index.js';
export * from './service/index.js';

import { RouterPulseService } from './service/router-pulse-service.js';

export default RouterPulseService;
