import { registerAs } from '@nestjs/config';
import { numberFromEnv } from './env';

export default registerAs('indexing', () => ({
  // When false, only nodes targeting the "live" workspace are written to the index
  indexAllWorkspaces: process.env.INDEX_ALL_WORKSPACES === 'true',

  // A bulk request is flushed as soon as either limit is reached
  batchSize: {
    elements: numberFromEnv('BATCH_SIZE_ELEMENTS', 500),
    octets: numberFromEnv('BATCH_SIZE_OCTETS', 40000000),
  },

  // Failed bulk items are dumped here for postmortem inspection
  logDirectory: process.env.INDEXING_LOG_DIRECTORY || 'data/logs/search',
}));
