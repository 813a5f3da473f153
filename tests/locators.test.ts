import { DEFAULT_LOCATORS, describeLocator, locatorSchema, toSelector, withKey } from '../src/core/locators';
import type { Locator } from '../src/core/types';

describe('toSelector', () => {
  it('passes CSS selectors through', () => {
    expect(toSelector({ kind: 'css', selector: 'input[type="email"]' })).toBe('input[type="email"]');
  });

  it('turns text locators into ::-p-text selectors scoped by tag', () => {
    expect(toSelector({ kind: 'text', text: 'Log in', tag: 'button' })).toBe('button::-p-text("Log in")');
    expect(toSelector({ kind: 'text', text: 'My page' })).toBe('::-p-text("My page")');
  });

  it('maps attribute match modes onto CSS operators', () => {
    expect(toSelector({ kind: 'attribute', attribute: 'autocomplete', value: 'username' })).toBe(
      '[autocomplete="username"]',
    );
    expect(toSelector({ kind: 'attribute', attribute: 'name', value: 'email', match: 'contains', tag: 'input' })).toBe(
      'input[name*="email"]',
    );
    expect(toSelector({ kind: 'attribute', attribute: 'href', value: '/users/', match: 'prefix', tag: 'a' })).toBe(
      'a[href^="/users/"]',
    );
  });

  it('builds ::-p-aria selectors for role locators', () => {
    expect(toSelector({ kind: 'role', role: 'button', name: 'Search' })).toBe('::-p-aria([name="Search"][role="button"])');
    expect(toSelector({ kind: 'role', role: 'textbox' })).toBe('::-p-aria([role="textbox"])');
  });

  it('escapes quotes inside values', () => {
    expect(toSelector({ kind: 'text', text: 'say "hi"' })).toBe('::-p-text("say \\"hi\\"")');
  });
});

describe('describeLocator', () => {
  it('prefixes the selector with the locator kind', () => {
    expect(describeLocator({ kind: 'css', selector: '#email' })).toBe('css:#email');
  });
});

describe('withKey', () => {
  it('substitutes the key into the default result candidates', () => {
    const resolved = withKey(DEFAULT_LOCATORS.result, 'alice');

    expect(resolved[0]).toEqual({ kind: 'text', text: 'alice', tag: 'a' });
    expect(resolved[1]).toEqual({ kind: 'attribute', attribute: 'href', value: 'alice', match: 'contains' });
    expect(resolved[2]).toEqual({ kind: 'text', text: 'alice' });
    expect(resolved[3]).toEqual({ kind: 'css', selector: '.user-item a' });
  });

  it('leaves the input list untouched', () => {
    const list: Locator[] = [{ kind: 'text', text: 'Profile of {key}' }];
    withKey(list, 'bob');
    expect(list[0]).toEqual({ kind: 'text', text: 'Profile of {key}' });
  });

  it('never templates CSS selectors', () => {
    const list: Locator[] = [{ kind: 'css', selector: '[data-id="{key}"]' }];
    expect(withKey(list, 'bob')).toEqual([{ kind: 'css', selector: '[data-id="{key}"]' }]);
  });

  it('substitutes every occurrence, including in role names', () => {
    const list: Locator[] = [
      { kind: 'role', role: 'link', name: '{key} ({key})' },
      { kind: 'role', role: 'link' },
    ];
    expect(withKey(list, 'carol')).toEqual([
      { kind: 'role', role: 'link', name: 'carol (carol)' },
      { kind: 'role', role: 'link' },
    ]);
  });

  it('inserts keys containing replacement patterns literally', () => {
    expect(withKey([{ kind: 'text', text: '{key}' }], '$&')).toEqual([{ kind: 'text', text: '$&' }]);
  });
});

describe('locator schema', () => {
  it('loads the built-in candidate lists', () => {
    expect(DEFAULT_LOCATORS.identifier[0]).toEqual({ kind: 'css', selector: 'input[type="email"]' });
    expect(DEFAULT_LOCATORS.secret[0]).toEqual({ kind: 'css', selector: 'input[type="password"]' });
    expect(DEFAULT_LOCATORS.submit[0]).toEqual({ kind: 'css', selector: 'button[type="submit"]' });
  });

  it('rejects unknown locator kinds', () => {
    expect(locatorSchema.safeParse({ kind: 'xpath', expression: '//a' }).success).toBe(false);
  });

  it('rejects empty values', () => {
    expect(locatorSchema.safeParse({ kind: 'text', text: '' }).success).toBe(false);
  });
});
