import { configureLogger } from '../src/integrations/utilities/logger.js';

configureLogger({ level: 'silent' });
