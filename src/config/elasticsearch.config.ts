import { registerAs } from '@nestjs/config';
import { numberFromEnv } from './env';

export default registerAs('elasticsearch', () => ({
  url: process.env.ELASTICSEARCH_URL || 'http://localhost:9200',
  timeout: numberFromEnv('ELASTICSEARCH_TIMEOUT', 30000),
  username: process.env.ELASTICSEARCH_USERNAME || undefined,
  password: process.env.ELASTICSEARCH_PASSWORD || undefined,

  // Physical indices are named <prefix>-<dimensionHash>[-<postfix>], so the prefix must not contain "-"
  indexNamePrefix: process.env.SEARCH_INDEX_PREFIX || 'contentrepository',
}));
