import { defineObject } from '@core/types/object-handle';
import {
  NULL,
  numberValue,
  sequenceValue,
  stringValue,
  type ObjectHandle,
  type Value
} from '@core/types/value';
import { createResolutionContext, type ResolutionContext, type ResolutionContextInit } from '@interpreter/env/ResolutionContext';

/**
 * A small object exposing properties, methods and a count, used across the
 * walker, post-processor and end-to-end tests.
 */
export function createCookie(): ObjectHandle {
  const ingredients = sequenceValue(['Flour', 'Sugar', 'Butter', 'Chocolate Chips'].map(stringValue));

  return defineObject('Cookie', {
    properties: {
      tasty: numberValue(100),
      type: stringValue('Chocolate Chip'),
      price: numberValue(1.25),
      ingredients,
      // Unset property: lookups fail
      topping: () => undefined
    },
    methods: {
      describe: () => stringValue('A Chocolate Chip cookie'),
      repeat: ([text, times]) => {
        if (text?.kind !== 'string' || times?.kind !== 'number') {
          return NULL;
        }
        return stringValue(text.value.repeat(times.value));
      },
      echo: args => sequenceValue(args),
      crumble: () => {
        throw new Error('too crunchy');
      }
    }
  });
}

export function textOf(value: Value): string | undefined {
  return value.kind === 'string' ? value.value : undefined;
}

export function createTestContext(init: ResolutionContextInit = {}): ResolutionContext {
  return createResolutionContext({
    query: { page: '2' },
    form: { name: 'Ada' },
    cookies: { theme: 'dark' },
    server: { REQUEST_METHOD: 'GET' },
    session: { userid: 42, user: { name: 'Ada', roles: ['admin', 'editor'] } },
    globals: { cookie_obj: createCookie() },
    ...init
  });
}
