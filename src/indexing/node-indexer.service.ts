import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { promises as fs } from 'fs';
import { join } from 'path';
import indexingConfig from '../config/indexing.config';
import { buildAllPathPrefixes, parentPath } from '../content-repository/context-path';
import {
  CONTENT_REPOSITORY,
  ContentContext,
  ContentNode,
  ContentRepository,
  LIVE_WORKSPACE_NAME,
} from '../content-repository/interfaces/content-repository.interface';
import { isFulltextEnabled, isFulltextRoot } from '../content-repository/node-type.utils';
import { DimensionsService } from '../dimensions/dimensions.service';
import {
  DimensionCombination,
  DimensionValues,
} from '../dimensions/interfaces/dimension.interface';
import { ApiError } from '../search-engine/errors/api.error';
import {
  AliasAction,
  BulkRequestTuple,
  BulkResponse,
  BulkResponseItem,
  DOCUMENT_DRIVER,
  DocumentDriver,
  INDEX_DRIVER,
  INDEXER_DRIVER,
  IndexDriver,
  IndexerDriver,
  REQUEST_DRIVER,
  RequestDriver,
} from '../search-engine/interfaces/driver.interface';
import { SearchClientService } from '../search-engine/search-client.service';
import { SearchIndex } from '../search-engine/search-index';
import { BulkRequestPart } from './bulk-request-part';
import { calculateDocumentIdentifier } from './document-identifier';
import { ErrorHandlingService } from './error-handling.service';
import { BulkIndexingError } from './errors/bulk-indexing.error';
import { ConfigurationError } from './errors/configuration.error';
import { InvalidBulkRequestPartError } from './errors/invalid-bulk-request-part.error';
import { MalformedBulkRequestError } from './errors/malformed-bulk-request.error';
import { IndexingSession } from './indexing-session';
import { DocumentData } from './interfaces/document.interface';
import { PropertyExtractorService } from './property-extractor.service';

/**
 * Writes content nodes to the search engine: every node is materialized once per
 * allowed dimension combination, the resulting operations are buffered and flushed as
 * one bulk request per dimension partition.
 *
 * The buffer is not safe for concurrent writers, callers serialize indexing runs.
 */
@Injectable()
export class NodeIndexerService {
  private readonly logger = new Logger(NodeIndexerService.name);
  private readonly session = new IndexingSession();
  private indexNamePostfix = '';
  private errorFileCount = 0;

  constructor(
    @Inject(indexingConfig.KEY)
    private readonly config: ConfigType<typeof indexingConfig>,
    @Inject(CONTENT_REPOSITORY) private readonly contentRepository: ContentRepository,
    private readonly searchClient: SearchClientService,
    private readonly dimensionsService: DimensionsService,
    @Inject(DOCUMENT_DRIVER) private readonly documentDriver: DocumentDriver,
    @Inject(INDEXER_DRIVER) private readonly indexerDriver: IndexerDriver,
    @Inject(INDEX_DRIVER) private readonly indexDriver: IndexDriver,
    @Inject(REQUEST_DRIVER) private readonly requestDriver: RequestDriver,
    private readonly propertyExtractor: PropertyExtractorService,
    private readonly errorHandlingService: ErrorHandlingService,
  ) {}

  setDimensions(dimensionValues: DimensionValues): void {
    this.searchClient.setDimensions(dimensionValues);
  }

  /**
   * Alias name of the active dimensions, with the postfix appended when one is set
   */
  getIndexName(): string {
    const indexName = this.searchClient.getIndexName();
    return this.indexNamePostfix === '' ? indexName : `${indexName}-${this.indexNamePostfix}`;
  }

  setIndexNamePostfix(indexNamePostfix: string): void {
    this.indexNamePostfix = indexNamePostfix;
  }

  getIndexNamePostfix(): string {
    return this.indexNamePostfix;
  }

  getIndex(): SearchIndex {
    const index = this.searchClient.findIndex(this.getIndexName());
    index.setSettingsKey(this.searchClient.getIndexName());
    return index;
  }

  getSession(): IndexingSession {
    return this.session;
  }

  calculateDocumentIdentifier(node: ContentNode, targetWorkspaceName?: string): string {
    return calculateDocumentIdentifier(node, targetWorkspaceName);
  }

  /**
   * Adds the documents of the node in every allowed dimension combination to the bulk
   * request.
   * @param node Node to index
   * @param targetWorkspaceName Workspace the node is published to, if any
   */
  async indexNode(node: ContentNode, targetWorkspaceName?: string): Promise<void> {
    const workspaceName = targetWorkspaceName ?? node.workspaceName;
    const combinations = this.contentRepository.getAllAllowedCombinations();

    if (combinations.length === 0) {
      await this.indexNodeInContext(
        node,
        this.createContentContext(workspaceName),
        targetWorkspaceName,
      );
      return;
    }

    for (const combination of combinations) {
      await this.indexNodeInContext(
        node,
        this.createContentContext(workspaceName, combination),
        targetWorkspaceName,
      );
    }
  }

  /**
   * Deletes the document of the node and clears its text from the fulltext root
   * @param node Node to remove
   * @param targetWorkspaceName Workspace the removal is published to, if any
   */
  async removeNode(node: ContentNode, targetWorkspaceName?: string): Promise<void> {
    if (this.isExcludedWorkspace(node, targetWorkspaceName)) {
      return;
    }

    const documentIdentifier = this.calculateDocumentIdentifier(node, targetWorkspaceName);

    await this.toBulkRequest(node, this.documentDriver.delete(node, documentIdentifier));
    // A root takes its fulltext with it
    if (!isFulltextRoot(node.nodeType)) {
      await this.toBulkRequest(
        node,
        await this.indexerDriver.fulltext(node, {}, targetWorkspaceName),
      );
    }

    this.logger.debug(
      `NodeIndexer (${documentIdentifier}): Removed node ${node.contextPath} (${node.identifier}) from index.`,
    );
  }

  /**
   * Sends the buffered operations, one bulk request per dimension partition. Items the
   * engine rejects are recorded in the ErrorHandlingService and dumped to the log
   * directory.
   *
   * A partition leaves the buffer once its bulk request returned. When a request throws,
   * the error propagates and the buffer keeps that partition and all partitions not sent
   * yet, so calling flush again sends exactly the outstanding work.
   */
  async flush(): Promise<void> {
    if (this.session.isEmpty()) {
      return;
    }

    // Group lines by dimension hash
    const payload = this.partitionPayload();
    this.logger.debug(
      `Flush bulk request, elements=${this.session.length}, maximumElements=${this.config.batchSize.elements}, octets=${this.session.size}, maximumOctets=${this.config.batchSize.octets}`,
    );
    if (payload.size === 0) {
      this.reset();
      return;
    }

    // Send each partition to the index of its dimensions
    for (const [hash, dimensions] of [...this.dimensionsService.getDimensionsRegistry()]) {
      const lines = payload.get(hash);
      if (lines === undefined || lines.length === 0) {
        continue;
      }

      await this.searchClient.withDimensions(async () => {
        const response = await this.requestDriver.bulk(this.getIndex(), lines.join('\n'));
        this.session.discard(part => part.getTargetDimensionsHash() === hash);
        await this.handleBulkResponse(lines, response);
      }, dimensions);
    }

    this.reset();
  }

  /**
   * Runs the callback with the duplicate document check disabled, only valid while the
   * target index holds no documents of outdated node types, e.g. during a full rebuild
   */
  async withBulkProcessing<T>(callback: () => Promise<T>): Promise<T> {
    const bulkProcessing = this.session.isBulkProcessing();
    this.session.setBulkProcessing(true);
    try {
      return await callback();
    } finally {
      this.session.setBulkProcessing(bulkProcessing);
    }
  }

  /**
   * Points the alias of the active dimensions at the index with the current postfix,
   * removing it from all other indices in the same request
   */
  async updateIndexAlias(): Promise<void> {
    const aliasName = this.searchClient.getIndexName();
    if (this.getIndexName() === aliasName) {
      throw new ConfigurationError(
        'updateIndexAlias is only allowed to be called when an index name postfix has been set.',
        1383649061,
      );
    }

    if (!(await this.getIndex().exists())) {
      throw new ConfigurationError(
        `The target index ${this.getIndexName()} for updateIndexAlias does not exist.`,
        1383649125,
      );
    }

    const aliasActions = await this.removeAliasActions(aliasName);
    aliasActions.push({ add: { index: this.getIndexName(), alias: aliasName } });

    await this.indexDriver.aliasActions(aliasActions);
  }

  /**
   * Points the prefix alias and the `<prefix>-<postfix>` alias at the indices of all
   * dimensions carrying the current postfix, so one alias queries every dimension
   */
  async updateMainAlias(): Promise<void> {
    const prefix = this.searchClient.getIndexNamePrefix();
    const postfixAlias = `${prefix}-${this.indexNamePostfix}`;
    const suffix = `-${this.indexNamePostfix}`;

    const indexNames = (await this.indexDriver.indexesByPrefix(`${prefix}-`)).filter(
      indexName => indexName.endsWith(suffix) && indexName.split('-').length === 3,
    );
    if (indexNames.length === 0) {
      return;
    }

    const aliasActions = [
      ...(await this.removeAliasActions(prefix)),
      ...(await this.removeAliasActions(postfixAlias)),
    ];
    for (const index of indexNames) {
      aliasActions.push({ add: { index, alias: prefix } });
      aliasActions.push({ add: { index, alias: postfixAlias } });
    }

    await this.indexDriver.aliasActions(aliasActions);
  }

  /**
   * Deletes the indices of the active dimensions the alias does not point at
   *
   * @returns names of the deleted indices
   */
  async removeOldIndices(): Promise<string[]> {
    const aliasName = this.searchClient.getIndexName();

    const currentlyLiveIndices = await this.indexDriver.indexesByAlias(aliasName);
    const indicesToBeRemoved = (await this.indexDriver.indexesByPrefix(`${aliasName}-`)).filter(
      indexName => !currentlyLiveIndices.includes(indexName),
    );

    for (const indexName of indicesToBeRemoved) {
      await this.indexDriver.deleteIndex(indexName);
    }

    return indicesToBeRemoved;
  }

  private createContentContext(
    workspaceName: string,
    dimensions?: DimensionCombination,
  ): ContentContext {
    return this.contentRepository.createContext({
      workspaceName,
      invisibleContentShown: true,
      ...(dimensions !== undefined && { dimensions }),
    });
  }

  private async indexNodeInContext(
    node: ContentNode,
    context: ContentContext,
    targetWorkspaceName?: string,
  ): Promise<void> {
    const nodeFromContext = await context.getNodeByIdentifier(node.identifier);
    if (nodeFromContext !== null) {
      await this.searchClient.withDimensions(
        () => this.indexMaterializedNode(nodeFromContext, targetWorkspaceName),
        nodeFromContext.targetDimensions,
      );
      return;
    }

    const documentIdentifier = this.calculateDocumentIdentifier(node, targetWorkspaceName);
    if (node.removed) {
      await this.removeNode(node, context.workspaceName);
      this.logger.debug(
        `NodeIndexer (${documentIdentifier}): Removed node with identifier ${node.identifier}, no longer in workspace ${context.workspaceName}`,
      );
      return;
    }

    this.logger.debug(
      `NodeIndexer (${documentIdentifier}): Could not index node with identifier ${node.identifier}, not found in workspace ${context.workspaceName} with dimensions ${JSON.stringify(context.dimensions)}`,
    );
  }

  private async indexMaterializedNode(
    node: ContentNode,
    targetWorkspaceName?: string,
  ): Promise<void> {
    if (this.isExcludedWorkspace(node, targetWorkspaceName)) {
      return;
    }

    const documentIdentifier = this.calculateDocumentIdentifier(node, targetWorkspaceName);

    if (!this.session.isBulkProcessing()) {
      this.logger.debug(
        `NodeIndexer (${documentIdentifier}): Search and remove duplicate document for node ${node.contextPath} (${node.identifier}) if needed.`,
      );
      await this.documentDriver.deleteDuplicateDocumentNotMatchingType(
        this.getIndex(),
        documentIdentifier,
        node.nodeType,
      );
    }

    const { properties, fulltext, unconfigured } = this.propertyExtractor.extract(node);
    for (const propertyName of unconfigured) {
      this.logger.debug(
        `NodeIndexer (${documentIdentifier}) - Property "${propertyName}" not indexed because no configuration found, node type ${node.nodeType.name}.`,
      );
    }

    const documentData = this.buildDocumentData(node, properties, targetWorkspaceName);

    if (isFulltextEnabled(node.nodeType)) {
      await this.toBulkRequest(
        node,
        this.indexerDriver.document(this.getIndexName(), node, documentIdentifier, documentData),
      );
      await this.toBulkRequest(
        node,
        await this.indexerDriver.fulltext(node, fulltext, targetWorkspaceName),
      );
    }

    this.logger.debug(`NodeIndexer (${documentIdentifier}): Indexed node ${node.contextPath}.`);
  }

  /**
   * With only the live workspace indexed, the target workspace decides when it is given
   * and the workspace of the node's context otherwise
   */
  private isExcludedWorkspace(node: ContentNode, targetWorkspaceName?: string): boolean {
    if (this.config.indexAllWorkspaces) {
      return false;
    }

    if (targetWorkspaceName !== undefined && targetWorkspaceName !== LIVE_WORKSPACE_NAME) {
      return true;
    }

    return targetWorkspaceName === undefined && node.workspaceName !== LIVE_WORKSPACE_NAME;
  }

  private buildDocumentData(
    node: ContentNode,
    properties: DocumentData,
    targetWorkspaceName?: string,
  ): DocumentData {
    const parent = parentPath(node.path);

    return {
      ...properties,
      __identifier: node.identifier,
      __path: node.path,
      __parentPath: parent === null ? [] : buildAllPathPrefixes(parent),
      __nodeType: node.nodeType.name,
      __typeAndSupertypes: [node.nodeType.name, ...node.nodeType.superTypes],
      ...(targetWorkspaceName !== undefined && { __workspace: targetWorkspaceName }),
    };
  }

  private async toBulkRequest(node: ContentNode, tuple: BulkRequestTuple | null): Promise<void> {
    if (tuple === null) {
      return;
    }

    this.session.append(new BulkRequestPart(this.dimensionsService.hashByNode(node), tuple));
    await this.flushIfNeeded();
  }

  private async flushIfNeeded(): Promise<void> {
    if (
      this.session.length >= this.config.batchSize.elements ||
      this.session.size >= this.config.batchSize.octets
    ) {
      await this.flush();
    }
  }

  /**
   * Encoded lines per dimension hash in append order. Malformed parts are reported and
   * dropped from the buffer.
   */
  private partitionPayload(): Map<string, string[]> {
    const payload = new Map<string, string[]>();
    const malformedParts = new Set<BulkRequestPart>();

    for (const part of this.session.getParts()) {
      if (!(part instanceof BulkRequestPart)) {
        throw new InvalidBulkRequestPartError(part);
      }

      const hash = part.getTargetDimensionsHash();
      if (part.isMalformed()) {
        malformedParts.add(part);
        this.errorHandlingService.log(
          new MalformedBulkRequestError(
            `Indexing Error: Bulk request item could not be encoded as JSON - ${part.getEncodingErrors().join(', ')}`,
            hash,
            part.getEncodingErrors(),
          ),
        );
        continue;
      }

      const lines = payload.get(hash) ?? [];
      for (const line of part.getRequest()) {
        if (line !== null) {
          lines.push(line);
        }
      }
      payload.set(hash, lines);
    }

    this.session.discard(part => malformedParts.has(part));

    return payload;
  }

  private async handleBulkResponse(lines: string[], response: BulkResponse): Promise<void> {
    if (!response.errors) {
      return;
    }

    for (const item of response.items) {
      if (item.error === undefined) {
        continue;
      }
      this.errorHandlingService.log(new BulkIndexingError(lines, item));
      await this.writeErrorFile(lines, item);
    }
  }

  private async writeErrorFile(lines: string[], item: BulkResponseItem): Promise<void> {
    const { logDirectory } = this.config;
    this.errorFileCount++;
    const file = join(logDirectory, `BulkIndexing_Error_${Date.now()}_${this.errorFileCount}.json`);

    try {
      await fs.mkdir(logDirectory, { recursive: true });
      await fs.writeFile(file, JSON.stringify({ request: lines, response: item }, null, 2));
    } catch (error) {
      // the rejected item is already recorded
      this.logger.warn(
        `Could not write bulk error file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private reset(): void {
    this.dimensionsService.reset();
    this.session.clear();
  }

  private async removeAliasActions(alias: string): Promise<AliasAction[]> {
    try {
      const indexNames = await this.indexDriver.indexesByAlias(alias);
      if (indexNames.length > 0) {
        return indexNames.map(index => ({ remove: { index, alias } }));
      }
    } catch (error) {
      // the alias does not exist yet
      if (!(error instanceof ApiError) || error.statusCode !== 404) {
        throw error;
      }
    }

    // an index carrying the alias name would block the alias
    if (await this.searchClient.findIndex(alias).exists()) {
      await this.indexDriver.deleteIndex(alias);
    }

    return [];
  }
}
