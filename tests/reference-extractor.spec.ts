/**
 * End-to-end tests for ReferenceExtractor on a small Rails-like project
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ReferenceExtractor, SNIPPET_PATH } from '../src/reference-extraction/ReferenceExtractor.js';
import { UnsupportedFileTypeError } from '../src/base/errors.js';
import type { Reference } from '../src/reference-extraction/types.js';

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

function targets(references: Reference[]): Array<[string, string]> {
  return references.map(reference => [reference.constant.name, reference.constant.location]);
}

describe('ReferenceExtractor', () => {
  let projectRoot: string;
  let extractor: ReferenceExtractor;

  beforeAll(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'constref-project-'));
    await writeFiles(projectRoot, {
      'app/models/order.rb': 'class Order < ApplicationRecord\n  has_many :line_items\nend\n',
      'app/models/line_item.rb': 'class LineItem < ApplicationRecord\n  belongs_to :order\nend\n',
      'app/models/billing/invoice.rb': [
        'module Billing',
        '  class Invoice',
        '    def total',
        '      Order.find(1)',
        '    end',
        '  end',
        'end',
        '',
      ].join('\n'),
      'app/views/orders/show.html.erb': '<h1><%= Order.count %></h1>\n<%= ::Billing::Invoice.first %>\n',
      'script/broken.rb': 'class Broken\n  def run(\nend\n',
      'app/assets/logo.png': 'not really an image',
    });
    extractor = await ReferenceExtractor.create(projectRoot);
  });

  afterAll(async () => {
    await fs.rm(projectRoot, { recursive: true, force: true });
  });

  describe('referencesFromString', () => {
    it('should resolve a top-level constant with its span', async () => {
      expect(await extractor.referencesFromString('Order.find(1)')).toEqual([
        {
          relativePath: SNIPPET_PATH,
          span: {
            startIndex: 0,
            endIndex: 5,
            start: { line: 1, column: 0 },
            end: { line: 1, column: 5 },
          },
          constant: { name: 'Order', path: ['Order'], location: 'app/models/order.rb' },
        },
      ]);
    });

    it('should find nothing in empty code', async () => {
      expect(await extractor.referencesFromString('')).toEqual([]);
    });

    it('should drop constants the project does not define', async () => {
      expect(await extractor.referencesFromString('Rails.logger.info(ApplicationRecord)')).toEqual([]);
    });

    it('should drop namespaces without a defining file', async () => {
      expect(await extractor.referencesFromString('Billing')).toEqual([]);
    });

    it('should look up enclosing namespaces before the top level', async () => {
      const references = await extractor.referencesFromString('module Billing\n  Invoice.new\n  Order.first\nend');

      expect(targets(references)).toEqual([
        ['Billing::Invoice', 'app/models/billing/invoice.rb'],
        ['Order', 'app/models/order.rb'],
      ]);
    });

    it('should resolve root-anchored names from any scope', async () => {
      const references = await extractor.referencesFromString('class Order\n  ::Billing::Invoice\nend');

      expect(targets(references)).toEqual([['Billing::Invoice', 'app/models/billing/invoice.rb']]);
    });

    it('should not reach a nested constant by its last segment', async () => {
      expect(await extractor.referencesFromString('Invoice.new')).toEqual([]);
    });

    it('should parse ERB snippets', async () => {
      const references = await extractor.referencesFromString('<%= Order.count %>', 'erb');

      expect(targets(references)).toEqual([['Order', 'app/models/order.rb']]);
    });
  });

  describe('referencesFromFile', () => {
    it('should extract references from a file in a namespace', async () => {
      const references = await extractor.referencesFromFile('app/models/billing/invoice.rb');

      expect(references).toHaveLength(1);
      expect(references[0].relativePath).toBe('app/models/billing/invoice.rb');
      expect(references[0].span.start).toEqual({ line: 4, column: 6 });
      expect(references[0].constant.location).toBe('app/models/order.rb');
    });

    it('should accept absolute paths', async () => {
      const references = await extractor.referencesFromFile(path.join(projectRoot, 'app/models/billing/invoice.rb'));

      expect(references.map(reference => reference.relativePath)).toEqual(['app/models/billing/invoice.rb']);
    });

    it('should extract references from ERB templates at template positions', async () => {
      const references = await extractor.referencesFromFile('app/views/orders/show.html.erb');

      expect(targets(references)).toEqual([
        ['Order', 'app/models/order.rb'],
        ['Billing::Invoice', 'app/models/billing/invoice.rb'],
      ]);
      expect(references.map(reference => reference.span.start)).toEqual([
        { line: 1, column: 8 },
        { line: 2, column: 4 },
      ]);
    });

    it('should return nothing for a missing file', async () => {
      expect(await extractor.referencesFromFile('app/models/missing.rb')).toEqual([]);
    });

    it('should return nothing for a file that does not parse', async () => {
      expect(await extractor.referencesFromFile('script/broken.rb')).toEqual([]);
    });

    it('should reject files no parser handles', async () => {
      await expect(extractor.referencesFromFile('app/assets/logo.png'))
        .rejects.toBeInstanceOf(UnsupportedFileTypeError);
    });

    it('should give the same result on repeated calls', async () => {
      const first = await extractor.referencesFromFile('app/views/orders/show.html.erb');
      const second = await extractor.referencesFromFile('app/views/orders/show.html.erb');

      expect(second).toEqual(first);
    });
  });

  describe('referencesFromFiles', () => {
    it('should concatenate results in input order', async () => {
      const references = await extractor.referencesFromFiles([
        'app/views/orders/show.html.erb',
        'app/models/missing.rb',
        'app/models/billing/invoice.rb',
      ]);

      expect(references.map(reference => reference.relativePath)).toEqual([
        'app/views/orders/show.html.erb',
        'app/views/orders/show.html.erb',
        'app/models/billing/invoice.rb',
      ]);
    });
  });

  describe('options', () => {
    it('should report association targets when enabled', async () => {
      const withAssociations = await ReferenceExtractor.create(projectRoot, { associations: true });

      expect(targets(await withAssociations.referencesFromFile('app/models/order.rb'))).toEqual([
        ['LineItem', 'app/models/line_item.rb'],
      ]);
      expect(await extractor.referencesFromFile('app/models/order.rb')).toEqual([]);
    });

    it('should attribute nested constants to the enclosing file when enabled', async () => {
      const attributing = await ReferenceExtractor.create(projectRoot, { attributeNestedConstants: true });

      expect(targets(await attributing.referencesFromString('Order::STATUSES'))).toEqual([
        ['Order::STATUSES', 'app/models/order.rb'],
      ]);
      expect(await extractor.referencesFromString('Order::STATUSES')).toEqual([]);
    });
  });
});

describe('ReferenceExtractor with constref.json', () => {
  let projectRoot: string;

  beforeAll(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'constref-configured-'));
    await writeFiles(projectRoot, {
      'constref.json': JSON.stringify({
        autoloadPaths: [{ path: 'lib', namespace: 'Acme' }],
        acronyms: ['CSV'],
      }),
      'lib/csv_export.rb': 'module Acme\n  class CSVExport\n  end\nend\n',
      'app/models/order.rb': 'class Order\nend\n',
    });
  });

  afterAll(async () => {
    await fs.rm(projectRoot, { recursive: true, force: true });
  });

  it('should index only the configured roots', async () => {
    const extractor = await ReferenceExtractor.create(projectRoot);

    expect(targets(await extractor.referencesFromString('Acme::CSVExport.new(Order)'))).toEqual([
      ['Acme::CSVExport', 'lib/csv_export.rb'],
    ]);
  });
});
