import { ContentRepositoryError } from './errors/content-repository.error';
import { JsonContentRepository } from './json-content-repository';
import { siteContent, translatedSiteContent } from '../../test/utils/content-fixtures';

describe('JsonContentRepository', () => {
  describe('fromData', () => {
    it('should reject data that does not match the schema', () => {
      expect(() => JsonContentRepository.fromData({ nodes: [] })).toThrow(ContentRepositoryError);
    });

    it('should reject nodes of undefined node types', () => {
      expect(() =>
        JsonContentRepository.fromData({
          nodeTypes: {},
          nodes: [{ identifier: 'a', path: '/a', nodeType: 'Acme.Site:Missing' }],
        }),
      ).toThrow('Node "a" uses undefined node type "Acme.Site:Missing"');
    });

    it('should reject inheritance cycles', () => {
      expect(() =>
        JsonContentRepository.fromData({
          nodeTypes: { A: { superTypes: ['B'] }, B: { superTypes: ['A'] } },
        }),
      ).toThrow('Node type inheritance cycle: A -> B -> A');
    });
  });

  describe('node types', () => {
    it('should merge properties and search configuration of super types', () => {
      const repository = JsonContentRepository.fromData(siteContent());
      const page = repository.getNodeType('Acme.Site:Page');

      expect(page.abstract).toBe(false);
      expect(page.superTypes).toEqual(['Acme.Site:Document']);
      expect(Object.keys(page.properties)).toEqual([
        'title',
        'uriPathSegment',
        'hideInMenu',
        'publishedAt',
      ]);
      expect(page.search.fulltext).toEqual({ enable: true, isRoot: true });
    });
  });

  describe('contexts', () => {
    it('should resolve nodes of the base workspace and hide other workspaces', async () => {
      const repository = JsonContentRepository.fromData(siteContent());

      const live = repository.createContext({ workspaceName: 'live' });
      const user = repository.createContext({ workspaceName: 'user-editor' });

      expect(await live.getNodeByIdentifier('draft-page')).toBeNull();
      expect((await user.getNodeByIdentifier('draft-page'))?.contextPath).toBe(
        'draft-page@user-editor',
      );
      expect((await user.getNodeByIdentifier('home-page'))?.workspaceName).toBe('user-editor');
    });

    it('should pick the best ranked dimension value and fall back to the next one', async () => {
      const repository = JsonContentRepository.fromData(translatedSiteContent());
      const context = repository.createContext({
        workspaceName: 'live',
        dimensions: { language: ['de', 'en'] },
      });

      const home = await context.getNodeByIdentifier('home-page');
      const about = await context.getNodeByIdentifier('about-page');

      expect(home?.properties.title).toBe('Startseite');
      expect(home?.contextPath).toBe('home-page@live;language=de');
      expect(about?.properties.title).toBe('About us');
      expect(about?.targetDimensions).toEqual({ language: 'de' });
      expect(about?.originDimensions).toEqual({ language: 'en' });
    });

    it('should list nodes parents first', async () => {
      const repository = JsonContentRepository.fromData(siteContent());
      const paths: string[] = [];

      for await (const node of repository.createContext({ workspaceName: 'live' }).findNodes()) {
        paths.push(node.path);
      }

      expect(paths).toEqual([
        '/sites',
        '/sites/acme',
        '/sites/acme/about',
        '/sites/acme/about/team',
        '/sites/acme/contact',
      ]);
    });

    it('should only show hidden and removed nodes when asked to', async () => {
      const data = siteContent();
      data.nodes = [
        ...(data.nodes ?? []),
        { identifier: 'hidden-page', path: '/sites/acme/hidden', nodeType: 'Acme.Site:Page', hidden: true },
        { identifier: 'removed-page', path: '/sites/acme/removed', nodeType: 'Acme.Site:Page', removed: true },
      ];
      const repository = JsonContentRepository.fromData(data);

      const context = repository.createContext({ workspaceName: 'live' });
      const invisible = repository.createContext({
        workspaceName: 'live',
        invisibleContentShown: true,
        removedContentShown: true,
      });

      expect(await context.getNodeByIdentifier('hidden-page')).toBeNull();
      expect(await context.getNodeByIdentifier('removed-page')).toBeNull();
      expect((await invisible.getNodeByIdentifier('hidden-page'))?.hidden).toBe(true);
      expect((await invisible.getNodeByIdentifier('removed-page'))?.removed).toBe(true);
    });

    it('should resolve parents through the context', async () => {
      const repository = JsonContentRepository.fromData(siteContent());
      const team = await repository
        .createContext({ workspaceName: 'live' })
        .getNodeByIdentifier('team-text');

      const parent = await team?.getParent();

      expect(parent?.identifier).toBe('about-page');
    });
  });

  describe('moveNode', () => {
    it('should move the node and its descendants', async () => {
      const repository = JsonContentRepository.fromData(siteContent());

      repository.moveNode('about-page', 'live', '/sites/acme/contact');

      const context = repository.createContext({ workspaceName: 'live' });
      expect((await context.getNodeByIdentifier('about-page'))?.path).toBe(
        '/sites/acme/contact/about',
      );
      expect((await context.getNodeByIdentifier('team-text'))?.path).toBe(
        '/sites/acme/contact/about/team',
      );
    });

    it('should fail for unknown nodes', () => {
      const repository = JsonContentRepository.fromData(siteContent());

      expect(() => repository.moveNode('missing', 'live', '/sites')).toThrow(ContentRepositoryError);
    });
  });
});
