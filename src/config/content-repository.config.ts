import { registerAs } from '@nestjs/config';

export default registerAs('contentRepository', () => ({
  file: process.env.CONTENT_REPOSITORY_FILE || 'content-repository.json',
}));
