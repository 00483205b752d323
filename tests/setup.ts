import { configureLogger, MemorySink } from '../src/integrations/utilities/logger.js';

configureLogger({ level: 'silent', sinks: [new MemorySink()] });
