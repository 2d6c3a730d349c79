import { ApiError } from '../../src/search-engine/errors/api.error';
import {
  HttpMethod,
  SearchTransport,
  TransportRequestOptions,
} from '../../src/search-engine/interfaces/transport.interface';

type Source = Record<string, unknown>;

interface FakeIndex {
  documents: Map<string, Source>;
  aliases: Set<string>;
  mappings: Source[];
  refreshCount: number;
}

export interface RecordedRequest {
  method: HttpMethod;
  path: string;
  body?: unknown;
}

export interface ItemError {
  type: string;
  reason: string;
}

function isRecord(value: unknown): value is Source {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Source {
  return isRecord(value) ? value : {};
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function fail(statusCode: number, type: string, reason: string): never {
  throw new ApiError(`${type} (${statusCode})`, statusCode, {
    error: { type, reason },
    status: statusCode,
  });
}

/**
 * In-process stand-in for the parts of the Elasticsearch 7 REST API the indexer uses
 */
export class FakeElasticsearch implements SearchTransport {
  readonly indices = new Map<string, FakeIndex>();
  readonly requests: RecordedRequest[] = [];

  /**
   * Lets a bulk item fail with the returned error
   */
  rejectBulkItem?: (action: string, id: string, source: unknown) => ItemError | undefined;

  /**
   * Makes the whole request fail
   */
  failRequest?: (method: HttpMethod, path: string) => ApiError | undefined;

  async request(
    method: HttpMethod,
    path: string,
    options: TransportRequestOptions = {},
  ): Promise<unknown> {
    this.requests.push({ method, path, body: options.body });

    const failure = this.failRequest?.(method, path);
    if (failure) {
      throw failure;
    }

    const [first = '', ...rest] = path.replace(/^\//, '').split('/');

    if (first === '_aliases' && method === 'POST') {
      return this.updateAliases(asArray(asRecord(options.body).actions));
    }
    if (first === '_alias' && method === 'GET') {
      return this.getAlias(rest[0] ?? '');
    }
    if (first === '_cat' && rest[0] === 'indices' && method === 'GET') {
      const pattern = rest[1] ?? '*';
      const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
      return [...this.indices.keys()]
        .filter(name => (pattern.endsWith('*') ? name.startsWith(prefix) : name === pattern))
        .sort()
        .map(index => ({ index }));
    }

    const endpoint = rest[0];
    if (endpoint === undefined) {
      return this.handleIndex(method, first);
    }

    switch (endpoint) {
      case '_refresh':
        for (const index of this.resolve(first)) {
          index.refreshCount++;
        }
        return { _shards: { failed: 0 } };
      case '_mapping':
        this.getPhysical(first).mappings.push(asRecord(options.body));
        return { acknowledged: true };
      case '_bulk':
        return this.bulk(first, typeof options.body === 'string' ? options.body : '');
      case '_delete_by_query':
        return this.deleteByQuery(first, asRecord(options.body).query);
      case '_search':
        return this.search(first, asRecord(options.body).query);
      default:
        return fail(400, 'illegal_argument_exception', `unsupported endpoint ${method} ${path}`);
    }
  }

  /**
   * Names of the indices an alias points at
   */
  aliasTargets(alias: string): string[] {
    return [...this.indices.entries()]
      .filter(([, index]) => index.aliases.has(alias))
      .map(([name]) => name)
      .sort();
  }

  documentsOf(indexName: string): Map<string, Source> {
    return this.getPhysical(indexName).documents;
  }

  createIndex(name: string): void {
    this.indices.set(name, { documents: new Map(), aliases: new Set(), mappings: [], refreshCount: 0 });
  }

  /**
   * Documents of an index or alias whose field holds the value
   */
  findByTerm(name: string, field: string, value: string): Array<{ index: string; id: string; source: Source }> {
    const hits: Array<{ index: string; id: string; source: Source }> = [];
    for (const [indexName, index] of this.indices) {
      if (indexName !== name && !index.aliases.has(name)) {
        continue;
      }
      for (const [id, source] of index.documents) {
        if (matches(id, source, { term: { [field]: value } })) {
          hits.push({ index: indexName, id, source });
        }
      }
    }
    return hits;
  }

  requestsTo(endpoint: string): RecordedRequest[] {
    return this.requests.filter(request => request.path.endsWith(endpoint));
  }

  private handleIndex(method: HttpMethod, name: string): unknown {
    switch (method) {
      case 'HEAD':
        if (this.resolve(name).length === 0) {
          return fail(404, 'index_not_found_exception', `no such index [${name}]`);
        }
        return '';
      case 'PUT':
        if (this.indices.has(name) || this.aliasTargets(name).length > 0) {
          return fail(400, 'resource_already_exists_exception', `index [${name}] already exists`);
        }
        this.createIndex(name);
        return { acknowledged: true, index: name };
      case 'DELETE':
        this.getPhysical(name);
        this.indices.delete(name);
        return { acknowledged: true };
      default:
        return fail(405, 'method_not_allowed', `${method} /${name}`);
    }
  }

  private getAlias(alias: string): unknown {
    const targets = this.aliasTargets(alias);
    if (targets.length === 0) {
      throw new ApiError(`alias [${alias}] missing (404)`, 404, {
        error: `alias [${alias}] missing`,
        status: 404,
      });
    }
    return Object.fromEntries(targets.map(name => [name, { aliases: { [alias]: {} } }]));
  }

  /**
   * Validates all actions before applying any of them
   */
  private updateAliases(actions: unknown[]): unknown {
    const changes: Array<{ add: boolean; index: FakeIndex; alias: string }> = [];

    for (const action of actions) {
      const record = asRecord(action);
      const add = isRecord(record.add);
      const { index, alias } = asRecord(add ? record.add : record.remove);
      if (typeof index !== 'string' || typeof alias !== 'string') {
        return fail(400, 'action_request_validation_exception', 'index and alias are required');
      }
      const target = this.getPhysical(index);
      if (add && this.indices.has(alias)) {
        return fail(400, 'invalid_alias_name_exception', `an index exists with the same name as the alias [${alias}]`);
      }
      if (!add && !target.aliases.has(alias)) {
        return fail(404, 'aliases_not_found_exception', `aliases [${alias}] missing`);
      }
      changes.push({ add, index: target, alias });
    }

    for (const { add, index, alias } of changes) {
      if (add) {
        index.aliases.add(alias);
      } else {
        index.aliases.delete(alias);
      }
    }

    return { acknowledged: true };
  }

  private bulk(indexName: string, body: string): unknown {
    const lines = body
      .split('\n')
      .filter(line => line !== '')
      .map((line): unknown => JSON.parse(line));
    const items: Source[] = [];
    let errors = false;

    for (let i = 0; i < lines.length; i++) {
      const actionLine = asRecord(lines[i]);
      const [action = 'unknown'] = Object.keys(actionLine);
      const meta = asRecord(actionLine[action]);
      const id = typeof meta._id === 'string' ? meta._id : '';
      const targetName = typeof meta._index === 'string' ? meta._index : indexName;
      const source = action === 'delete' ? undefined : lines[++i];

      const rejection = this.rejectBulkItem?.(action, id, source);
      if (rejection) {
        errors = true;
        items.push({ [action]: { _index: targetName, _id: id, status: 400, error: rejection } });
        continue;
      }

      const result = this.applyBulkItem(this.writeTarget(targetName), action, id, source);
      if (result.error !== undefined) {
        errors = true;
      }
      items.push({ [action]: { _index: targetName, _id: id, ...result } });
    }

    return { took: 1, errors, items };
  }

  private applyBulkItem(index: FakeIndex, action: string, id: string, source: unknown): Source {
    const existing = index.documents.get(id);

    switch (action) {
      case 'index':
      case 'create':
        index.documents.set(id, asRecord(source));
        return { result: existing ? 'updated' : 'created', status: existing ? 200 : 201 };
      case 'delete':
        if (!existing) {
          return { result: 'not_found', status: 404 };
        }
        index.documents.delete(id);
        return { result: 'deleted', status: 200 };
      case 'update': {
        const update = asRecord(source);
        if (!existing) {
          if (!isRecord(update.upsert)) {
            return {
              status: 404,
              error: { type: 'document_missing_exception', reason: `[_doc][${id}]: document missing` },
            };
          }
          index.documents.set(id, update.upsert);
          return { result: 'created', status: 201 };
        }
        index.documents.set(id, this.applyUpdate(existing, update));
        return { result: 'updated', status: 200 };
      }
      default:
        return { status: 400, error: { type: 'illegal_argument_exception', reason: `unknown action ${action}` } };
    }
  }

  /**
   * Mirrors the indexer's painless scripts by their parameters
   */
  private applyUpdate(existing: Source, update: Source): Source {
    if (isRecord(update.doc)) {
      return { ...existing, ...update.doc };
    }

    const params = asRecord(asRecord(update.script).params);
    if (isRecord(params.newData)) {
      return {
        ...params.newData,
        __fulltext: asRecord(existing.__fulltext),
        __fulltextParts: asRecord(existing.__fulltextParts),
      };
    }

    if (typeof params.identifier === 'string' && isRecord(params.fulltext)) {
      const parts = { ...asRecord(existing.__fulltextParts) };
      if (params.nodeIsRemoved === true || params.nodeIsHidden === true || Object.keys(params.fulltext).length === 0) {
        delete parts[params.identifier];
      } else {
        parts[params.identifier] = params.fulltext;
      }

      const fulltext: Record<string, string> = {};
      for (const part of Object.values(parts)) {
        for (const [bucket, value] of Object.entries(asRecord(part))) {
          const text = String(value).trim();
          fulltext[bucket] = fulltext[bucket] === undefined ? text : `${fulltext[bucket]} ${text}`;
        }
      }
      return { ...existing, __fulltext: fulltext, __fulltextParts: parts };
    }

    return existing;
  }

  private deleteByQuery(indexName: string, query: unknown): unknown {
    let deleted = 0;
    for (const index of this.resolve(indexName)) {
      for (const [id, source] of [...index.documents]) {
        if (matches(id, source, query)) {
          index.documents.delete(id);
          deleted++;
        }
      }
    }
    return { deleted };
  }

  private search(indexName: string, query: unknown): unknown {
    const indices = this.resolve(indexName);
    if (indices.length === 0) {
      return fail(404, 'index_not_found_exception', `no such index [${indexName}]`);
    }

    const hits: Source[] = [];
    for (const [name, index] of this.indices) {
      if (!indices.includes(index)) {
        continue;
      }
      for (const [id, source] of index.documents) {
        if (matches(id, source, query)) {
          hits.push({ _index: name, _id: id, _source: source });
        }
      }
    }

    return { hits: { total: { value: hits.length, relation: 'eq' }, hits } };
  }

  /**
   * Physical indices behind a name or an alias
   */
  private resolve(name: string): FakeIndex[] {
    const physical = this.indices.get(name);
    if (physical) {
      return [physical];
    }
    return [...this.indices.values()].filter(index => index.aliases.has(name));
  }

  private getPhysical(name: string): FakeIndex {
    const index = this.indices.get(name);
    if (!index) {
      return fail(404, 'index_not_found_exception', `no such index [${name}]`);
    }
    return index;
  }

  /**
   * Writes through an alias need exactly one target, missing indices are created
   */
  private writeTarget(name: string): FakeIndex {
    const indices = this.resolve(name);
    if (indices.length > 1) {
      return fail(400, 'illegal_argument_exception', `alias [${name}] has more than one index`);
    }
    if (indices.length === 0) {
      this.createIndex(name);
      return this.getPhysical(name);
    }
    return indices[0];
  }
}

function matches(id: string, source: Source, query: unknown): boolean {
  if (query === undefined) {
    return true;
  }

  const clause = asRecord(query);
  if (isRecord(clause.match_all)) {
    return true;
  }
  if (isRecord(clause.ids)) {
    return asArray(clause.ids.values).includes(id);
  }
  if (isRecord(clause.term)) {
    return Object.entries(clause.term).every(([field, expected]) => {
      const value = isRecord(expected) ? expected.value : expected;
      return asArray(source[field]).includes(value);
    });
  }
  if (isRecord(clause.bool)) {
    const { must, filter, must_not: mustNot } = clause.bool;
    return (
      [...asArray(must), ...asArray(filter)].every(inner => matches(id, source, inner)) &&
      !asArray(mustNot).some(inner => matches(id, source, inner))
    );
  }

  return false;
}
