import { buildNode, buildNodeType } from '../../../test/utils/content-fixtures';
import { SearchTransport } from '../interfaces/transport.interface';
import { SearchIndex } from '../search-index';
import { ElasticsearchDocumentDriver } from './document.driver';

describe('ElasticsearchDocumentDriver', () => {
  const driver = new ElasticsearchDocumentDriver();

  it('should build a delete operation for the document', () => {
    expect(driver.delete(buildNode({ identifier: 'team-text' }), 'abc123')).toEqual([
      { delete: { _id: 'abc123' } },
    ]);
  });

  it('should delete documents of the identifier stored by another node type', async () => {
    const transport: jest.Mocked<SearchTransport> = {
      request: jest.fn().mockResolvedValue({ took: 2, deleted: 1 }),
    };

    await driver.deleteDuplicateDocumentNotMatchingType(
      new SearchIndex(transport, 'site-default'),
      'abc123',
      buildNodeType('Acme.Site:Page'),
    );

    expect(transport.request).toHaveBeenCalledWith('POST', '/site-default/_delete_by_query', {
      body: {
        query: {
          bool: {
            must: { ids: { values: ['abc123'] } },
            must_not: { term: { __nodeType: 'Acme.Site:Page' } },
          },
        },
      },
      contentType: undefined,
    });
  });
});
