import { ApiError } from './errors/api.error';
import { HttpMethod, SearchTransport } from './interfaces/transport.interface';

/**
 * Handle of one physical index (or an alias resolving to one). Creating the handle
 * performs no I/O.
 */
export class SearchIndex {
  private settingsKey: string;

  constructor(
    private readonly transport: SearchTransport,
    readonly name: string,
  ) {
    this.settingsKey = name;
  }

  /**
   * Logical name the index is configured under, i.e. its alias
   */
  getSettingsKey(): string {
    return this.settingsKey;
  }

  setSettingsKey(settingsKey: string): void {
    this.settingsKey = settingsKey;
  }

  async exists(): Promise<boolean> {
    try {
      await this.transport.request('HEAD', `/${this.name}`);
      return true;
    } catch (error) {
      if (error instanceof ApiError && error.statusCode === 404) {
        return false;
      }
      throw error;
    }
  }

  async create(settings: Record<string, unknown> = {}): Promise<void> {
    await this.transport.request('PUT', `/${this.name}`, { body: { settings } });
  }

  async delete(): Promise<void> {
    await this.transport.request('DELETE', `/${this.name}`);
  }

  async refresh(): Promise<void> {
    await this.transport.request('POST', `/${this.name}/_refresh`);
  }

  /**
   * Request scoped to this index, `path` is relative to the index, e.g. `/_search`
   */
  async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    contentType?: string,
  ): Promise<unknown> {
    return this.transport.request(method, `/${this.name}${path}`, { body, contentType });
  }
}
