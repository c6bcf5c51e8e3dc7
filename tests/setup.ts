import { setLogLevel } from '../src/logging.js';

setLogLevel('error');
