import {
  DimensionCombination,
  TargetDimensionValues,
} from '../../dimensions/interfaces/dimension.interface';

export const CONTENT_REPOSITORY = 'CONTENT_REPOSITORY';

export const LIVE_WORKSPACE_NAME = 'live';

/**
 * Named strategies a property can be indexed with, see PropertyExtractorService
 */
export type IndexingStrategyName =
  | 'string'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'date'
  | 'array'
  | 'reference'
  | 'references';

export type FulltextExtractorName = 'text' | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'html';

export interface PropertySearchConfiguration {
  /**
   * `false` keeps the property out of the index, a strategy name overrides the one derived
   * from the property type
   */
  indexing?: boolean | IndexingStrategyName;

  /**
   * Fulltext bucket(s) the property value is routed into
   */
  fulltextExtractor?: FulltextExtractorName;

  /**
   * Explicit search engine field mapping, takes precedence over the type default
   */
  mapping?: Record<string, unknown>;
}

export interface PropertyConfiguration {
  type?: string;
  search?: PropertySearchConfiguration;
}

export interface NodeTypeSearchConfiguration {
  fulltext?: {
    enable?: boolean;
    isRoot?: boolean;
  };
}

export interface NodeType {
  name: string;
  abstract: boolean;

  /**
   * All super types, transitively resolved
   */
  superTypes: string[];

  /**
   * Property schema including inherited properties
   */
  properties: Record<string, PropertyConfiguration>;

  search: NodeTypeSearchConfiguration;
}

/**
 * A node as materialized in one (workspace, dimension combination) context
 */
export interface ContentNode {
  /** Stable aggregate identifier, shared by all materializations */
  identifier: string;
  name: string;
  label: string;
  path: string;

  /** Identity + workspace + target dimensions of this materialization */
  contextPath: string;

  /** Workspace of the context the node was resolved in */
  workspaceName: string;

  /** Dimension combination of the context the node was resolved in */
  dimensions: DimensionCombination;

  /** Dimension values the context targets, i.e. the first value of each dimension */
  targetDimensions: TargetDimensionValues;

  /** Dimension values the node's data actually originates from (differs on fallback) */
  originDimensions: TargetDimensionValues;

  nodeType: NodeType;
  properties: Record<string, unknown>;
  removed: boolean;
  hidden: boolean;

  getParent(): Promise<ContentNode | null>;
}

export interface ContentContextOptions {
  workspaceName: string;
  dimensions?: DimensionCombination;
  invisibleContentShown?: boolean;
  removedContentShown?: boolean;
}

export interface ContentContext {
  readonly workspaceName: string;
  readonly dimensions: DimensionCombination;
  readonly targetDimensions: TargetDimensionValues;

  getNodeByIdentifier(identifier: string): Promise<ContentNode | null>;
  getNodeByPath(path: string): Promise<ContentNode | null>;

  /**
   * Every node visible in this context, parents before their children
   */
  findNodes(): AsyncIterable<ContentNode>;
}

export interface Workspace {
  name: string;
  baseWorkspaceName?: string;
}

/**
 * Read access to the content graph the index is built from
 */
export interface ContentRepository {
  createContext(options: ContentContextOptions): ContentContext;
  getAllAllowedCombinations(): DimensionCombination[];
  findWorkspaces(): Promise<Workspace[]>;
  findWorkspace(name: string): Promise<Workspace | null>;
  getNodeTypes(): NodeType[];
}
