import { initLogger } from '../src/utils/logger';

// Keep test output clean
initLogger({ level: 'critical', console: false });
