/**
 * Tests for the WASM loader and the Ruby parser in Node.js
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { WasmLoader } from '../src/wasm/WasmLoader.js';
import { RubyLanguageParser } from '../src/ruby/RubyLanguageParser.js';
import { childByField } from '../src/base/SyntaxTree.js';

describe('WasmLoader (Node.js)', () => {
  beforeEach(() => {
    WasmLoader.clearCache();
  });

  it('should load Ruby parser', async () => {
    const { parser, language } = await WasmLoader.loadParser('ruby');

    expect(parser).toBeDefined();
    expect(language).toBeDefined();

    const tree = parser.parse('def hello(name)\n  "Hello #{name}"\nend');

    expect(tree?.rootNode.type).toBe('program');
  });

  it('should cache parser instances', async () => {
    expect(WasmLoader.isCached('ruby')).toBe(false);

    const { parser: parser1 } = await WasmLoader.loadParser('ruby');
    expect(WasmLoader.isCached('ruby')).toBe(true);

    const { parser: parser2 } = await WasmLoader.loadParser('ruby');
    expect(parser1).toBe(parser2);
  });
});

describe('RubyLanguageParser', () => {
  const parser = new RubyLanguageParser();

  it('should convert the tree with field names and leaf text', async () => {
    const root = await parser.parse('class Foo < Bar\nend\n');

    expect(root?.type).toBe('program');
    const klass = root?.children[0];
    expect(klass?.type).toBe('class');

    const name = klass && childByField(klass, 'name');
    expect(name?.type).toBe('constant');
    expect(name?.text).toBe('Foo');

    const superclass = klass && childByField(klass, 'superclass');
    expect(superclass?.type).toBe('superclass');
    expect(superclass?.children[0]?.text).toBe('Bar');
  });

  it('should record spans with 1-based lines and 0-based columns', async () => {
    const root = await parser.parse('x = 1\nOrder.find(1)');
    const call = root?.children[1];
    const receiver = call && childByField(call, 'receiver');

    expect(receiver?.text).toBe('Order');
    expect(receiver?.span).toEqual({
      startIndex: 6,
      endIndex: 11,
      start: { line: 2, column: 0 },
      end: { line: 2, column: 5 },
    });
  });

  it('should return null for source with syntax errors', async () => {
    expect(await parser.parse('class Foo\n  def bar(\nend')).toBeNull();
  });

  it('should claim Ruby extensions and well-known file names', () => {
    expect(parser.canHandle('app/models/order.rb')).toBe(true);
    expect(parser.canHandle('lib/tasks/cleanup.rake')).toBe(true);
    expect(parser.canHandle('config.ru')).toBe(true);
    expect(parser.canHandle('/project/Gemfile')).toBe(true);
    expect(parser.canHandle('app/assets/logo.png')).toBe(false);
    expect(parser.canHandle('app/views/show.html.erb')).toBe(false);
  });
});
