import { setLogHandler } from '../src/logger';

// Keep test output readable; individual tests install collecting handlers.
setLogHandler(() => undefined);
