import { describe, it, expect } from 'vitest';
import { createTagPattern, replaceTags, scanTags } from './tag-scanner';

const pattern = createTagPattern(1024);

describe('scanTags', () => {
  it('reads path, post-processor and raw marker', () => {
    expect(scanTags('x <session:user::json~/> y', pattern)).toEqual([
      { source: '<session:user::json~/>', path: 'session:user', postProcessor: 'json', raw: true, offset: 2 }
    ]);
  });

  it('reads a bare tag', () => {
    expect(scanTags('<user/>', pattern)).toEqual([
      { source: '<user/>', path: 'user', postProcessor: undefined, raw: false, offset: 0 }
    ]);
  });

  it('allows calls with quoted arguments in the body', () => {
    const [tag] = scanTags(`<obj:repeat('a, b', 2)/>`, pattern);
    expect(tag.path).toBe(`obj:repeat('a, b', 2)`);
  });

  it('finds several tags left to right', () => {
    const tags = scanTags('<a/><b:c/>', pattern);
    expect(tags.map(tag => tag.path)).toEqual(['a', 'b:c']);
    expect(tags.map(tag => tag.offset)).toEqual([0, 4]);
  });

  it('ignores candidates with disallowed characters', () => {
    expect(scanTags('<a.b/> <a=b/> <p>text</p> <img src="x"/>', pattern)).toEqual([]);
  });

  it('does not match without the self-closing delimiter', () => {
    expect(scanTags('<session:user>', pattern)).toEqual([]);
  });

  it('caps the body length', () => {
    const short = createTagPattern(3);
    expect(scanTags('<abcd/>', short)).toEqual([]);
    expect(scanTags('<abc/>', short).map(tag => tag.path)).toEqual(['abc']);
  });
});

describe('replaceTags', () => {
  it('substitutes tags and keeps surrounding text', () => {
    const result = replaceTags('Hi <name/>, bye <name::upper/>!', pattern, tag => `[${tag.path}|${tag.postProcessor ?? ''}]`);
    expect(result).toBe('Hi [name|], bye [name|upper]!');
  });

  it('returns text without tags unchanged', () => {
    const text = '<div class="a">1 < 2 && 3 > 2</div>';
    expect(replaceTags(text, pattern, () => 'X')).toBe(text);
  });
});
