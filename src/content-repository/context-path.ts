import { TargetDimensionValues } from '../dimensions/interfaces/dimension.interface';
import { ContentNode } from './interfaces/content-repository.interface';

/**
 * Builds `<identifier>@<workspace>[;<dimension>=<value>&...]`, dimensions in key order.
 */
export function buildContextPath(
  identifier: string,
  workspaceName: string,
  targetDimensions: TargetDimensionValues,
): string {
  const dimensions = Object.keys(targetDimensions)
    .sort()
    .map(name => `${name}=${targetDimensions[name]}`)
    .join('&');

  return dimensions === ''
    ? `${identifier}@${workspaceName}`
    : `${identifier}@${workspaceName};${dimensions}`;
}

/**
 * Context path of a node as it will look once published into the target workspace.
 */
export class TargetContextPath {
  constructor(
    private readonly node: ContentNode,
    private readonly targetWorkspaceName: string,
  ) {}

  toString(): string {
    return buildContextPath(
      this.node.identifier,
      this.targetWorkspaceName,
      this.node.targetDimensions,
    );
  }
}

export function parentPath(path: string): string | null {
  if (path === '/' || path === '') {
    return null;
  }

  const parent = path.substring(0, path.lastIndexOf('/'));
  return parent === '' ? '/' : parent;
}

/**
 * `/sites/a/b` becomes `['/', '/sites', '/sites/a', '/sites/a/b']`
 */
export function buildAllPathPrefixes(path: string): string[] {
  if (path === '' || !path.startsWith('/')) {
    return [];
  }

  const prefixes = ['/'];
  let current = '';
  for (const segment of path.split('/')) {
    if (segment === '') {
      continue;
    }
    current = `${current}/${segment}`;
    prefixes.push(current);
  }

  return prefixes;
}
