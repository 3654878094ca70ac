import pino from 'pino';
import { setLogger } from '@screenlingo/logger';

setLogger(pino({ level: 'silent' }));
