import { Test, TestingModule } from '@nestjs/testing';
import { ConfigType } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppModule } from '../../src/app.module';
import { ConsoleOutput } from '../../src/command/console-output';
import elasticsearchConfig from '../../src/config/elasticsearch.config';
import indexingConfig from '../../src/config/indexing.config';
import { CONTENT_REPOSITORY } from '../../src/content-repository/interfaces/content-repository.interface';
import {
  ContentRepositoryData,
  JsonContentRepository,
} from '../../src/content-repository/json-content-repository';
import { SEARCH_TRANSPORT } from '../../src/search-engine/interfaces/transport.interface';
import { siteContent } from './content-fixtures';
import { FakeElasticsearch } from './fake-elasticsearch';

export class RecordingConsoleOutput extends ConsoleOutput {
  text = '';

  output(text: string): void {
    this.text += text;
  }

  outputLine(line = ''): void {
    this.text += `${line}\n`;
  }

  lines(): string[] {
    return this.text.split('\n');
  }
}

export interface TestingAppOptions {
  content?: ContentRepositoryData;
  indexing?: Partial<ConfigType<typeof indexingConfig>>;
}

export interface TestingApp {
  module: TestingModule;
  repository: JsonContentRepository;
  transport: FakeElasticsearch;
  output: RecordingConsoleOutput;
}

/**
 * The application wired against an in-memory content repository and search engine
 */
export async function createTestingApp(options: TestingAppOptions = {}): Promise<TestingApp> {
  const repository = JsonContentRepository.fromData(options.content ?? siteContent());
  const transport = new FakeElasticsearch();
  const output = new RecordingConsoleOutput();

  const indexing: ConfigType<typeof indexingConfig> = {
    indexAllWorkspaces: false,
    batchSize: { elements: 500, octets: 40000000 },
    logDirectory: join(tmpdir(), 'content-search-indexer-test'),
    ...options.indexing,
  };
  const elasticsearch: ConfigType<typeof elasticsearchConfig> = {
    url: 'http://localhost:9200',
    timeout: 1000,
    username: undefined,
    password: undefined,
    indexNamePrefix: 'testindex',
  };

  const module = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(indexingConfig.KEY)
    .useValue(indexing)
    .overrideProvider(elasticsearchConfig.KEY)
    .useValue(elasticsearch)
    .overrideProvider(CONTENT_REPOSITORY)
    .useValue(repository)
    .overrideProvider(SEARCH_TRANSPORT)
    .useValue(transport)
    .overrideProvider(ConsoleOutput)
    .useValue(output)
    .compile();

  return { module, repository, transport, output };
}
