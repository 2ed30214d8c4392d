import { describe, it, expect, beforeEach } from 'vitest';
import { pageIndex, resolveTarget, unwrap } from '../src/session.js';
import { TrackerManager } from '../src/manager.js';
import { NotFoundError, ParseError, ok, err } from '../src/errors.js';
import { isYes } from '../src/prompt.js';
import { MemoryStore } from './helpers/memory-store.js';

describe('pageIndex', () => {
  it('should turn a 1-based page option into an index', () => {
    expect(pageIndex(undefined)).toBe(0);
    expect(pageIndex('2')).toBe(1);
  });

  it('should reject pages below one', () => {
    expect(() => pageIndex('0')).toThrow("Invalid page '0'");
    expect(() => pageIndex('two')).toThrow("Invalid page 'two'");
    expect(() => pageIndex('0')).toThrow(ParseError);
  });
});

describe('unwrap', () => {
  it('should return the value or throw the error', () => {
    expect(unwrap(ok(3))).toBe(3);
    expect(() => unwrap(err(new NotFoundError(3)))).toThrow('No tracker with id 3');
  });
});

describe('resolveTarget', () => {
  let manager: TrackerManager;

  beforeEach(() => {
    manager = unwrap(TrackerManager.open(new MemoryStore()));
    unwrap(manager.createTracker('Laundry'));
    unwrap(manager.createTracker('Dishes'));
  });

  it('should accept tracker ids', () => {
    expect(resolveTarget(manager, '2', 0)).toBe(2);
    expect(() => resolveTarget(manager, '9', 0)).toThrow(NotFoundError);
  });

  it('should resolve tags on the given page', () => {
    expect(resolveTarget(manager, 'B', 0)).toBe(2);
    expect(() => resolveTarget(manager, 'c', 0)).toThrow("No tracker tagged 'c' on page 1");
    expect(() => resolveTarget(manager, 'a', 1)).toThrow("No tracker tagged 'a' on page 2");
    expect(() => resolveTarget(manager, 'c', 0)).toThrow(NotFoundError);
  });

  it('should reject anything else', () => {
    expect(() => resolveTarget(manager, 'ab', 0)).toThrow("'ab' is neither a tag (a-z) nor a tracker id");
    expect(() => resolveTarget(manager, 'ab', 0)).toThrow(ParseError);
  });
});

describe('isYes', () => {
  it('should read y-prefixed answers as yes and fall back on empty input', () => {
    expect(isYes('Yes')).toBe(true);
    expect(isYes(' n ')).toBe(false);
    expect(isYes('')).toBe(false);
    expect(isYes('  ', true)).toBe(true);
  });
});
