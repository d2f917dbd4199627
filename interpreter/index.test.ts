import { describe, it, expect, vi } from 'vitest';
import { TagResolver, resolveBuffer } from './index';
import { TagErrorCode } from '@core/errors';
import type { TagDiagnostic } from '@core/types/diagnostics';
import { numberValue, objectValue, sequenceValue, stringValue, type ObjectHandle } from '@core/types/value';
import { defineObject } from '@core/types/object-handle';
import { createCookie, createTestContext } from '@tests/utils/fixtures';

describe('resolveBuffer', () => {
  it('returns text without tags unchanged', () => {
    const text = '<h1>Hi!</h1>\n<p class="x">a < b</p>';
    expect(resolveBuffer(text, createTestContext())).toBe(text);
  });

  it('substitutes store values', () => {
    const context = createTestContext();
    expect(resolveBuffer('User <session:userid/> on page <get:page/>', context)).toBe('User 42 on page 2');
  });

  it('sanitizes by default and honours the raw marker', () => {
    const context = createTestContext({ globals: { markup: '<b>' } });
    expect(resolveBuffer('<markup/>|<markup~/>', context)).toBe('&lt;b&gt;|<b>');
  });

  it('resolves named globals and blanks undefined ones', () => {
    const context = createTestContext();
    expect(resolveBuffer('[<cookie_obj:type/>][<nobody/>][<br/>]', context)).toBe('[Chocolate Chip][][]');
  });

  it('applies post-processors', () => {
    const context = createTestContext();
    expect(resolveBuffer('<cookie_obj:ingredients::count/>', context)).toBe('4');
    expect(resolveBuffer('<cookie_obj:type::count/>', context)).toBe('');
    expect(resolveBuffer('<cookie_obj:type::upper/>', context)).toBe('CHOCOLATE CHIP');
    expect(resolveBuffer('<session:user:roles::json~/>', context)).toBe('["admin","editor"]');
  });

  it('escapes post-processed output unless raw', () => {
    const context = createTestContext();
    expect(resolveBuffer('<session:user:roles::json/>', context)).toBe('[&quot;admin&quot;,&quot;editor&quot;]');
  });

  it('pretty-prints objects', () => {
    const context = createTestContext();
    expect(resolveBuffer('<cookie_obj:ingredients::pjson~/>', context)).toBe(
      '[\n    "Flour",\n    "Sugar",\n    "Butter",\n    "Chocolate Chips"\n]'
    );
  });

  it('dumps structured values', () => {
    const context = createTestContext();
    expect(resolveBuffer('<session:user:roles~/>', context)).toBe('Array\n(\n    [0] => admin\n    [1] => editor\n)\n');
  });

  it('calls methods with arguments, including references and nested parentheses', () => {
    const context = createTestContext();
    expect(resolveBuffer(`<cookie_obj:repeat('(a:b)', 2)~/>`, context)).toBe('(a:b)(a:b)');
    expect(resolveBuffer('<cookie_obj:echo(post:name, 1):0/>', context)).toBe('Ada');
  });

  it('calls free functions when there is no object context', () => {
    const context = createTestContext({
      functions: { year: () => numberValue(2024) }
    });
    expect(resolveBuffer('<fn:year()/>', context)).toBe('2024');
  });

  it('substitutes nothing when a lookup fails, even with a post-processor', () => {
    const context = createTestContext();
    expect(resolveBuffer('[<session:nope::json/>]', context)).toBe('[]');
    expect(resolveBuffer('[<session:user:email/>]', context)).toBe('[]');
  });

  it('runs post-processors on a genuine null', () => {
    const context = createTestContext({ session: { empty: null } });
    expect(resolveBuffer('[<session:empty::json/>]', context)).toBe('[null]');
    expect(resolveBuffer('[<nobody::json/>]', context)).toBe('[null]');
  });

  it('blanks unknown post-processors', () => {
    const context = createTestContext();
    expect(resolveBuffer('[<session:userid::shout/>]', context)).toBe('[]');
  });

  it('unsets session keys for later tags only', () => {
    const context = createTestContext();
    const output = resolveBuffer('<session:userid/>|<session:userid::unset/>|<session:userid/>', context);

    expect(output).toBe('42||');
    expect(context.stores.session.has('userid')).toBe(false);
  });

  it('keeps resolving after a failing tag', () => {
    const context = createTestContext();
    expect(resolveBuffer('<cookie_obj:crumble()/>-<cookie_obj:tasty/>', context)).toBe('-100');
  });

  it('reads registered local values', () => {
    const context = createTestContext();
    const token = context.registry.register(stringValue('Chocolate Chip'));
    expect(resolveBuffer(`Hi, I'm a <registry:${token}/> cookie!`, context)).toBe("Hi, I'm a Chocolate Chip cookie!");
  });

  it('is a no-op on already substituted output', () => {
    const context = createTestContext();
    const once = resolveBuffer('<p><cookie_obj:type/> costs <cookie_obj:price/></p>', context);
    expect(once).toBe('<p>Chocolate Chip costs 1.25</p>');
    expect(resolveBuffer(once, context)).toBe(once);
  });
});

describe('TagResolver', () => {
  it('reports fail-soft events to the diagnostic hook', () => {
    const diagnostics: TagDiagnostic[] = [];
    const resolver = new TagResolver(createTestContext(), {
      onDiagnostic: diagnostic => diagnostics.push(diagnostic)
    });

    resolver.resolveBuffer('<session:nope/><x::shout/><cookie_obj:echo(banana)/><cookie_obj:crumble()/>');

    expect(diagnostics.map(d => [d.code, d.tag])).toEqual([
      [TagErrorCode.LOOKUP_FAILED, '<session:nope/>'],
      [TagErrorCode.UNKNOWN_POST_PROCESSOR, '<x::shout/>'],
      [TagErrorCode.INVALID_ARGUMENT_TOKEN, '<cookie_obj:echo(banana)/>'],
      [TagErrorCode.METHOD_FAILED, '<cookie_obj:crumble()/>']
    ]);
  });

  it('blanks tags nested deeper than the limit', () => {
    const onDiagnostic = vi.fn();
    const resolver = new TagResolver(createTestContext(), { maxDepth: 1, onDiagnostic });

    expect(resolver.resolveBuffer("[<cookie_obj:repeat('((x))', 1)/>]")).toBe('[]');
    expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({ code: TagErrorCode.MAX_DEPTH_EXCEEDED }));
  });

  it('survives a throwing diagnostic hook', () => {
    const resolver = new TagResolver(createTestContext(), {
      onDiagnostic: () => {
        throw new Error('hook failed');
      }
    });

    expect(resolver.resolveBuffer('<session:nope/>ok')).toBe('ok');
  });

  it('can turn sanitization off for every tag', () => {
    const context = createTestContext({ globals: { markup: '<i>' } });
    expect(new TagResolver(context, { sanitize: false }).resolveBuffer('<markup/>')).toBe('<i>');
  });

  it('exposes single-tag resolution', () => {
    const resolver = new TagResolver(createTestContext({ globals: { cookie: createCookie() } }));
    expect(resolver.resolveTag({
      source: '<cookie:tasty/>',
      path: 'cookie:tasty',
      raw: false,
      offset: 0
    })).toBe('100');
  });

  it('treats caller records with a kind field as plain data', () => {
    const context = createTestContext({
      session: { item: { kind: 'string', value: 'Scone', price: 3 } }
    });

    expect(resolveBuffer('[<session:item:price/>] [<session:item:value/>]', context)).toBe('[3] [Scone]');
  });

  it('runs a call whose reference argument throws, passing null for it', () => {
    const oven = defineObject('Oven', {
      properties: {
        temperature: () => {
          throw new Error('oven fire');
        }
      }
    });
    const context = createTestContext({
      globals: { oven },
      functions: { wrap: args => sequenceValue(args) }
    });
    const onDiagnostic = vi.fn();

    expect(resolveBuffer('[<nothing:wrap(oven:temperature, 1)::count/>]', context, { onDiagnostic })).toBe('[2]');
    expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({
      code: TagErrorCode.LOOKUP_FAILED,
      tag: '<nothing:wrap(oven:temperature, 1)::count/>'
    }));
  });

  it('falls back to default limits when given invalid ones', () => {
    const context = createTestContext();

    expect(resolveBuffer('x<session:userid/>', context, { maxTagLength: 0 })).toBe('x42');
    expect(resolveBuffer('x<session:userid/>', context, { maxTagLength: 1.5, maxDepth: -1 })).toBe('x42');
    expect(resolveBuffer('<session:user:roles::pjson~/>', context, { jsonIndent: 40 }))
      .toBe('[\n    "admin",\n    "editor"\n]');
  });

  it('marks recursion in self-referencing objects', () => {
    const loop: ObjectHandle = defineObject('Loop', {
      properties: {
        name: stringValue('loop'),
        me: () => objectValue(loop)
      }
    });
    const context = createTestContext({ globals: { self: loop } });

    expect(resolveBuffer('<self/>', context)).toBe(
      'Loop Object\n(\n    [name] => loop\n    [me] => Loop Object\n *RECURSION*\n)\n'
    );
    expect(resolveBuffer('<self::json~/>', context)).toBe('{"name":"loop","me":null}');
  });
});
