import { Logger } from '../../../shared/utils/logger';

export const logger = new Logger('IPBeacon Server', 'server');
