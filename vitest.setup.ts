import { configureLogger } from 'core-service';

// Keep test output readable; tests that assert on logs subscribe instead.
configureLogger({ level: 'debug', console: false });
