import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { dump } from 'js-yaml';
import indexingConfig from '../config/indexing.config';
import {
  CONTENT_REPOSITORY,
  ContentNode,
  ContentRepository,
  LIVE_WORKSPACE_NAME,
  Workspace,
} from '../content-repository/interfaces/content-repository.interface';
import { DimensionCombination } from '../dimensions/interfaces/dimension.interface';
import { ErrorHandlingService } from '../indexing/error-handling.service';
import { NodeIndexerService } from '../indexing/node-indexer.service';
import { NodeTypeMappingBuilderService } from '../mapping/node-type-mapping-builder.service';
import { ApiError } from '../search-engine/errors/api.error';
import { ConsoleOutput } from './console-output';

export interface BuildOptions {
  /** Amount of nodes to index at maximum */
  limit?: number;

  /** Keep the current index instead of creating a new one, for development only */
  update?: boolean;

  workspace?: string;

  /** Index name postfix, an index with the same postfix is deleted first */
  postfix?: string;
}

/**
 * Index management commands, each returning the process exit code
 */
@Injectable()
export class NodeIndexCommand {
  private readonly logger = new Logger(NodeIndexCommand.name);

  constructor(
    @Inject(indexingConfig.KEY)
    private readonly config: ConfigType<typeof indexingConfig>,
    @Inject(CONTENT_REPOSITORY) private readonly contentRepository: ContentRepository,
    private readonly nodeIndexer: NodeIndexerService,
    private readonly nodeTypeMappingBuilder: NodeTypeMappingBuilderService,
    private readonly errorHandlingService: ErrorHandlingService,
    private readonly console: ConsoleOutput,
  ) {}

  /**
   * Prints the mapping which would be sent to the search engine
   */
  async showMapping(): Promise<number> {
    const { mappings, warnings } = this.nodeTypeMappingBuilder.buildMappingInformation(
      this.nodeIndexer.getIndex(),
    );

    for (const mapping of mappings) {
      this.console.output(
        dump({ [mapping.mappingName]: mapping.toJSON() }, { indent: 2, noRefs: true }),
      );
      this.console.outputLine();
    }
    this.console.outputLine('------------');

    if (warnings.length > 0) {
      this.console.outputLine('Mapping Warnings');
      for (const warning of warnings) {
        this.console.outputLine(warning);
      }
    }

    return 0;
  }

  /**
   * Indexes a single node in one workspace, or in every workspace when none is given
   * @param identifier Node identifier
   * @param workspaceName Workspace to look the node up in
   */
  async indexNode(identifier: string, workspaceName?: string): Promise<number> {
    const workspaces = await this.resolveWorkspaces(workspaceName);
    if (workspaces === null) {
      return 1;
    }

    for (const workspace of workspaces) {
      const node = await this.findNodeInWorkspace(identifier, workspace.name);
      if (node === null) {
        this.console.outputLine('Node with the given identifier is not found.');
        return 1;
      }

      this.console.outputLine();
      this.console.outputLine(`Index node "${node.label}" (${node.identifier})`);
      this.console.outputLine(`  workspace: ${workspace.name}`);
      this.console.outputLine(`  node type: ${node.nodeType.name}`);
      this.console.outputLine(`  dimensions: ${JSON.stringify(node.dimensions)}`);

      await this.nodeIndexer.indexNode(node);
    }

    await this.nodeIndexer.flush();

    return 0;
  }

  /**
   * Indexes all nodes into a new index per dimension combination and switches the
   * aliases once everything is written
   */
  async build(options: BuildOptions = {}): Promise<number> {
    const { limit, update = false, postfix } = options;

    const workspaces = await this.resolveWorkspaces(options.workspace);
    if (workspaces === null) {
      return 1;
    }

    const dimensionCombinations = this.dimensionCombinations();

    // Create fresh indices unless updating the live ones
    if (update) {
      this.logger.warn('!!! Update Mode (Development) active!');
    } else {
      this.nodeIndexer.setIndexNamePostfix(postfix ?? String(Math.floor(Date.now() / 1000)));
      for (const dimensions of dimensionCombinations) {
        this.nodeIndexer.setDimensions(dimensions);
        await this.createNewIndex();
      }
    }

    // Mappings go in before the first document
    for (const dimensions of dimensionCombinations) {
      this.nodeIndexer.setDimensions(dimensions);
      await this.applyMapping();
    }

    this.console.outputLine(`Indexing ${limit !== undefined ? `the first ${limit} ` : ''}nodes ...`);

    let count = 0;
    await this.nodeIndexer.withBulkProcessing(async () => {
      for (const workspace of workspaces) {
        count += await this.indexWorkspace(
          workspace.name,
          limit === undefined ? undefined : limit - count,
        );
      }
    });
    await this.nodeIndexer.flush();

    // Report what the engine rejected
    if (this.errorHandlingService.hasError()) {
      this.console.outputLine();
      for (const error of this.errorHandlingService) {
        this.console.outputLine(`Error ${error.message}`);
      }
      this.console.outputLine();
      this.console.outputLine('Check your logs for more information');
    } else {
      this.console.outputLine(`Done. (indexed ${count} nodes)`);
    }

    // Switch aliases
    for (const dimensions of dimensionCombinations) {
      this.nodeIndexer.setDimensions(dimensions);
      await this.nodeIndexer.getIndex().refresh();
      if (!update) {
        await this.nodeIndexer.updateIndexAlias();
      }
    }

    if (!update) {
      await this.nodeIndexer.updateMainAlias();
    }

    return 0;
  }

  /**
   * Removes all indices but the ones the aliases point at
   */
  async cleanup(): Promise<number> {
    for (const dimensions of this.dimensionCombinations()) {
      this.nodeIndexer.setDimensions(dimensions);

      try {
        const removedIndices = await this.nodeIndexer.removeOldIndices();
        if (removedIndices.length === 0) {
          this.console.outputLine('Nothing to remove.');
        }
        for (const indexName of removedIndices) {
          this.console.outputLine(`Removing old index ${indexName}`);
        }
      } catch (error) {
        if (!(error instanceof ApiError)) {
          throw error;
        }
        this.console.outputLine(
          `Nothing removed. The search engine responded with status ${error.statusCode}, saying "${error.describe()}"`,
        );
      }
    }

    return 0;
  }

  /**
   * All workspaces, or the given one, or live when only live is indexed. Null when the
   * given workspace does not exist.
   */
  private async resolveWorkspaces(workspaceName?: string): Promise<Workspace[] | null> {
    const name =
      workspaceName === undefined && !this.config.indexAllWorkspaces
        ? LIVE_WORKSPACE_NAME
        : workspaceName;
    if (name === undefined) {
      return this.contentRepository.findWorkspaces();
    }

    const workspace = await this.contentRepository.findWorkspace(name);
    if (workspace === null) {
      this.console.outputLine(`The given workspace (${name}) does not exist.`);
      return null;
    }

    return [workspace];
  }

  private dimensionCombinations(): DimensionCombination[] {
    const combinations = this.contentRepository.getAllAllowedCombinations();
    return combinations.length === 0 ? [{}] : combinations;
  }

  private async findNodeInWorkspace(
    identifier: string,
    workspaceName: string,
  ): Promise<ContentNode | null> {
    for (const dimensions of this.dimensionCombinations()) {
      const context = this.contentRepository.createContext({
        workspaceName,
        dimensions,
        invisibleContentShown: true,
      });
      const node = await context.getNodeByIdentifier(identifier);
      if (node !== null) {
        return node;
      }
    }
    return null;
  }

  private async createNewIndex(): Promise<void> {
    const index = this.nodeIndexer.getIndex();
    if (await index.exists()) {
      this.logger.warn(
        `Deleted index with the same postfix (${this.nodeIndexer.getIndexNamePostfix()})!`,
      );
      await index.delete();
    }
    await index.create();
    this.console.outputLine(`Created index ${index.name}`);
  }

  private async applyMapping(): Promise<void> {
    const { mappings } = this.nodeTypeMappingBuilder.buildMappingInformation(
      this.nodeIndexer.getIndex(),
    );
    for (const mapping of mappings) {
      await mapping.apply();
    }
    this.console.outputLine(`Updated mapping of ${this.nodeIndexer.getIndexName()}`);
  }

  /**
   * Indexes every node of the workspace once, whichever combination it is found in first
   *
   * @returns number of indexed nodes
   */
  private async indexWorkspace(workspaceName: string, limit?: number): Promise<number> {
    const indexed = new Set<string>();

    for (const dimensions of this.dimensionCombinations()) {
      const context = this.contentRepository.createContext({
        workspaceName,
        dimensions,
        invisibleContentShown: true,
      });

      for await (const node of context.findNodes()) {
        if (limit !== undefined && indexed.size >= limit) {
          break;
        }
        if (indexed.has(node.identifier)) {
          continue;
        }
        indexed.add(node.identifier);
        await this.nodeIndexer.indexNode(node);
      }
    }

    this.console.outputLine(`Workspace "${workspaceName}" done. (Indexed ${indexed.size} nodes)`);

    return indexed.size;
  }
}
