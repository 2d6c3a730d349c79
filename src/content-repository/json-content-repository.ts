import { promises as fs } from 'fs';
import { z } from 'zod';
import {
  DimensionCombination,
  TargetDimensionValues,
} from '../dimensions/interfaces/dimension.interface';
import { buildContextPath, parentPath } from './context-path';
import { ContentRepositoryError } from './errors/content-repository.error';
import {
  ContentContext,
  ContentContextOptions,
  ContentNode,
  ContentRepository,
  LIVE_WORKSPACE_NAME,
  NodeType,
  PropertyConfiguration,
  Workspace,
} from './interfaces/content-repository.interface';

const propertySchema = z.object({
  type: z.string().optional(),
  search: z
    .object({
      indexing: z
        .union([
          z.boolean(),
          z.enum([
            'string',
            'boolean',
            'integer',
            'float',
            'date',
            'array',
            'reference',
            'references',
          ]),
        ])
        .optional(),
      fulltextExtractor: z.enum(['text', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'html']).optional(),
      mapping: z.record(z.unknown()).optional(),
    })
    .optional(),
});

const nodeTypeSchema = z.object({
  abstract: z.boolean().default(false),
  superTypes: z.array(z.string()).default([]),
  properties: z.record(propertySchema).default({}),
  search: z
    .object({
      fulltext: z
        .object({
          enable: z.boolean().optional(),
          isRoot: z.boolean().optional(),
        })
        .optional(),
    })
    .default({}),
});

const nodeSchema = z.object({
  identifier: z.string().min(1),
  path: z.string().startsWith('/'),
  nodeType: z.string(),
  workspace: z.string().default(LIVE_WORKSPACE_NAME),
  dimensions: z.record(z.string()).default({}),
  properties: z.record(z.unknown()).default({}),
  removed: z.boolean().default(false),
  hidden: z.boolean().default(false),
});

const contentRepositorySchema = z.object({
  dimensionCombinations: z.array(z.record(z.array(z.string()).min(1))).default([]),
  nodeTypes: z.record(nodeTypeSchema),
  workspaces: z
    .array(z.object({ name: z.string(), baseWorkspace: z.string().optional() }))
    .default([{ name: LIVE_WORKSPACE_NAME }]),
  nodes: z.array(nodeSchema).default([]),
});

export type ContentRepositoryData = z.input<typeof contentRepositorySchema>;

type NodeTypeDefinition = z.output<typeof nodeTypeSchema>;
type NodeRecord = z.output<typeof nodeSchema>;

/**
 * Content repository kept in memory, loaded from a JSON document of node types,
 * workspaces, allowed dimension combinations and node records.
 *
 * Records of a workspace shadow those of its base workspaces; within a workspace the
 * record whose dimension values rank best in the context's combination wins.
 */
export class JsonContentRepository implements ContentRepository {
  private nodes: NodeRecord[];

  private constructor(
    private readonly nodeTypes: Map<string, NodeType>,
    private readonly workspaces: Workspace[],
    private readonly combinations: DimensionCombination[],
    nodes: NodeRecord[],
  ) {
    this.nodes = nodes;
  }

  static async fromFile(file: string): Promise<JsonContentRepository> {
    const contents = await fs.readFile(file, 'utf-8');
    return JsonContentRepository.fromData(JSON.parse(contents));
  }

  static fromData(data: unknown): JsonContentRepository {
    const result = contentRepositorySchema.safeParse(data);
    if (!result.success) {
      throw new ContentRepositoryError(`Invalid content repository data: ${result.error.message}`);
    }

    const { nodeTypes, workspaces, dimensionCombinations, nodes } = result.data;
    const resolvedNodeTypes = resolveNodeTypes(nodeTypes);

    for (const node of nodes) {
      if (!resolvedNodeTypes.has(node.nodeType)) {
        throw new ContentRepositoryError(
          `Node "${node.identifier}" uses undefined node type "${node.nodeType}"`,
        );
      }
    }

    return new JsonContentRepository(
      resolvedNodeTypes,
      workspaces.map(workspace => ({
        name: workspace.name,
        baseWorkspaceName: workspace.baseWorkspace,
      })),
      dimensionCombinations,
      nodes,
    );
  }

  createContext(options: ContentContextOptions): ContentContext {
    return new InMemoryContentContext(this, options, this.workspaceChain(options.workspaceName));
  }

  getAllAllowedCombinations(): DimensionCombination[] {
    return this.combinations.map(combination => ({ ...combination }));
  }

  async findWorkspaces(): Promise<Workspace[]> {
    return [...this.workspaces];
  }

  async findWorkspace(name: string): Promise<Workspace | null> {
    return this.workspaces.find(workspace => workspace.name === name) ?? null;
  }

  getNodeTypes(): NodeType[] {
    return [...this.nodeTypes.values()];
  }

  getNodeType(name: string): NodeType {
    const nodeType = this.nodeTypes.get(name);
    if (!nodeType) {
      throw new ContentRepositoryError(`Node type "${name}" is not defined`);
    }
    return nodeType;
  }

  getRecords(): readonly NodeRecord[] {
    return this.nodes;
  }

  /**
   * Moves a node and its descendants below a new parent within one workspace.
   */
  moveNode(identifier: string, workspaceName: string, newParentPath: string): void {
    const moved = this.nodes.filter(
      node => node.identifier === identifier && node.workspace === workspaceName,
    );
    if (moved.length === 0) {
      throw new ContentRepositoryError(
        `Node "${identifier}" does not exist in workspace "${workspaceName}"`,
      );
    }

    for (const { path } of moved) {
      const name = path.substring(path.lastIndexOf('/') + 1);
      const newPath = `${newParentPath === '/' ? '' : newParentPath}/${name}`;

      this.nodes = this.nodes.map(node => {
        if (node.workspace !== workspaceName) {
          return node;
        }
        if (node.path === path) {
          return { ...node, path: newPath };
        }
        if (node.path.startsWith(`${path}/`)) {
          return { ...node, path: newPath + node.path.substring(path.length) };
        }
        return node;
      });
    }
  }

  private workspaceChain(workspaceName: string): string[] {
    const chain: string[] = [];
    let current: string | undefined = workspaceName;

    while (current !== undefined && !chain.includes(current)) {
      chain.push(current);
      const name: string = current;
      current = this.workspaces.find(workspace => workspace.name === name)?.baseWorkspaceName;
    }

    return chain;
  }
}

class InMemoryContentContext implements ContentContext {
  readonly workspaceName: string;
  readonly dimensions: DimensionCombination;
  readonly targetDimensions: TargetDimensionValues;

  constructor(
    private readonly repository: JsonContentRepository,
    private readonly options: ContentContextOptions,
    private readonly workspaceChain: string[],
  ) {
    this.workspaceName = options.workspaceName;
    this.dimensions = options.dimensions ?? {};
    this.targetDimensions = Object.fromEntries(
      Object.entries(this.dimensions).map(([name, values]) => [name, values[0]]),
    );
  }

  async getNodeByIdentifier(identifier: string): Promise<ContentNode | null> {
    const record = this.effectiveRecords().get(identifier);
    return record ? this.materialize(record) : null;
  }

  async getNodeByPath(path: string): Promise<ContentNode | null> {
    for (const record of this.effectiveRecords().values()) {
      if (record.path === path) {
        return this.materialize(record);
      }
    }
    return null;
  }

  async *findNodes(): AsyncIterable<ContentNode> {
    const records = [...this.effectiveRecords().values()].sort((a, b) =>
      a.path.localeCompare(b.path),
    );

    for (const record of records) {
      const node = this.materialize(record);
      if (node) {
        yield node;
      }
    }
  }

  /**
   * Identifier to the record visible in this context, nearest workspace first
   */
  private effectiveRecords(): Map<string, NodeRecord> {
    const effective = new Map<string, NodeRecord>();

    for (const workspaceName of [...this.workspaceChain].reverse()) {
      const ranked = new Map<string, { record: NodeRecord; rank: number[] }>();

      for (const record of this.repository.getRecords()) {
        if (record.workspace !== workspaceName) {
          continue;
        }
        const rank = this.rank(record.dimensions);
        if (rank === null) {
          continue;
        }
        const current = ranked.get(record.identifier);
        if (!current || compareRanks(rank, current.rank) < 0) {
          ranked.set(record.identifier, { record, rank });
        }
      }

      for (const [identifier, { record }] of ranked) {
        effective.set(identifier, record);
      }
    }

    return effective;
  }

  /**
   * Position of the record's value in each dimension's preference list, null when the
   * record is not visible in this combination
   */
  private rank(recordDimensions: TargetDimensionValues): number[] | null {
    const rank: number[] = [];

    for (const name of Object.keys(this.dimensions).sort()) {
      const position = this.dimensions[name].indexOf(recordDimensions[name]);
      if (position === -1) {
        return null;
      }
      rank.push(position);
    }

    return rank;
  }

  private materialize(record: NodeRecord): ContentNode | null {
    if (record.removed && this.options.removedContentShown !== true) {
      return null;
    }
    if (record.hidden && this.options.invisibleContentShown !== true) {
      return null;
    }

    const nodeType = this.repository.getNodeType(record.nodeType);
    const name = record.path.substring(record.path.lastIndexOf('/') + 1);
    const title = record.properties.title;

    return {
      identifier: record.identifier,
      name,
      label: typeof title === 'string' && title !== '' ? title : name,
      path: record.path,
      contextPath: buildContextPath(record.identifier, this.workspaceName, this.targetDimensions),
      workspaceName: this.workspaceName,
      dimensions: this.dimensions,
      targetDimensions: this.targetDimensions,
      originDimensions: record.dimensions,
      nodeType,
      properties: record.properties,
      removed: record.removed,
      hidden: record.hidden,
      getParent: async () => {
        const path = parentPath(record.path);
        return path === null ? null : this.getNodeByPath(path);
      },
    };
  }
}

function compareRanks(a: number[], b: number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

function resolveNodeTypes(definitions: Record<string, NodeTypeDefinition>): Map<string, NodeType> {
  const resolved = new Map<string, NodeType>();

  const resolve = (name: string, stack: string[]): NodeType => {
    const existing = resolved.get(name);
    if (existing) {
      return existing;
    }

    const definition = definitions[name];
    if (!definition) {
      throw new ContentRepositoryError(`Node type "${name}" is not defined`);
    }
    if (stack.includes(name)) {
      throw new ContentRepositoryError(
        `Node type inheritance cycle: ${[...stack, name].join(' -> ')}`,
      );
    }

    const superTypes: string[] = [];
    let properties: Record<string, PropertyConfiguration> = {};
    let fulltext: NodeType['search']['fulltext'] = {};

    for (const superTypeName of definition.superTypes) {
      const superType = resolve(superTypeName, [...stack, name]);
      for (const typeName of [superTypeName, ...superType.superTypes]) {
        if (!superTypes.includes(typeName)) {
          superTypes.push(typeName);
        }
      }
      properties = { ...properties, ...superType.properties };
      fulltext = { ...fulltext, ...superType.search.fulltext };
    }

    const nodeType: NodeType = {
      name,
      abstract: definition.abstract,
      superTypes,
      properties: { ...properties, ...definition.properties },
      search: { fulltext: { ...fulltext, ...definition.search.fulltext } },
    };
    resolved.set(name, nodeType);

    return nodeType;
  };

  for (const name of Object.keys(definitions)) {
    resolve(name, []);
  }

  return resolved;
}
