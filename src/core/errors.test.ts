/**
 * Engine Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AttributeLimitError,
  ConfigurationError,
  DanglingOpenGroupError,
  InfiniteRepeatInCompositeError,
  InvalidChildError,
  InvalidParameterError,
  MissingAccessorError,
  StaleHandleError,
  StructuralMutationAfterBuildError,
  TweenEngineError,
  UnclosedNestedTreeError,
  isTweenEngineError,
} from './errors';

describe('TweenEngineError', () => {
  // ===========================================================================
  // Codes
  // ===========================================================================

  it.each([
    [new StructuralMutationAfterBuildError('push'), 'STRUCTURE_LOCKED'],
    [new DanglingOpenGroupError(), 'NOTHING_TO_END'],
    [new UnclosedNestedTreeError(2), 'UNCLOSED_GROUP'],
    [new InfiniteRepeatInCompositeError(), 'INFINITE_REPEAT'],
    [new InvalidChildError('nope'), 'INVALID_CHILD'],
    [new MissingAccessorError('Sprite'), 'MISSING_ACCESSOR'],
    [new AttributeLimitError(4, 3), 'ATTRIBUTE_LIMIT'],
    [new InvalidParameterError('duration', 'too small'), 'INVALID_PARAMETER'],
    [new StaleHandleError('stale'), 'STALE_HANDLE'],
    [new ConfigurationError('bad', 'logLevel'), 'CONFIG_ERROR'],
  ])('should expose code for %s', (error, code) => {
    expect(error.code).toBe(code);
    expect(error.recoverable).toBe(false);
    expect(error).toBeInstanceOf(TweenEngineError);
    expect(error).toBeInstanceOf(Error);
  });

  // ===========================================================================
  // Messages & Fields
  // ===========================================================================

  it('should name the operation of a structural mutation', () => {
    const error = new StructuralMutationAfterBuildError('beginSequence');

    expect(error.operation).toBe('beginSequence');
    expect(error.message).toBe('Cannot call beginSequence() once the unit is built or started');
    expect(error.name).toBe('StructuralMutationAfterBuildError');
  });

  it('should make a dangling end() a structural mutation error', () => {
    const error = new DanglingOpenGroupError();

    expect(error).toBeInstanceOf(StructuralMutationAfterBuildError);
    expect(error.operation).toBe('end');
    expect(error.message).toBe('Nothing to end: no nested group is open');
  });

  it('should report the number of open groups', () => {
    const error = new UnclosedNestedTreeError(2);

    expect(error.openGroups).toBe(2);
    expect(error.message).toBe('Timeline still has 2 open nested group(s); call end() for each of them');
  });

  it('should describe the invalid parameter', () => {
    const error = new InvalidParameterError('repeat count', 'must be an integer');

    expect(error.parameter).toBe('repeat count');
    expect(error.message).toBe('Invalid repeat count: must be an integer');
  });

  it('should describe the attribute limit', () => {
    const error = new AttributeLimitError(4, 3);
    expect(error.message).toBe('Tween attribute count 4 exceeds the combined attributes limit of 3');
  });

  // ===========================================================================
  // Serialization
  // ===========================================================================

  describe('toJSON', () => {
    it('should include the common fields', () => {
      const json = new InfiniteRepeatInCompositeError().toJSON();

      expect(json.name).toBe('InfiniteRepeatInCompositeError');
      expect(json.code).toBe('INFINITE_REPEAT');
      expect(json.message).toBe('A timeline cannot contain a child with infinite repetitions');
      expect(json.recoverable).toBe(false);
      expect(typeof json.timestamp).toBe('number');
    });

    it('should include subclass fields', () => {
      expect(new MissingAccessorError('Sprite').toJSON().targetType).toBe('Sprite');
      expect(new ConfigurationError('bad', 'logLevel').toJSON().invalidField).toBe('logLevel');
      expect(new DanglingOpenGroupError().toJSON().operation).toBe('end');
    });
  });

  // ===========================================================================
  // Type Guard
  // ===========================================================================

  describe('isTweenEngineError', () => {
    it('should recognize engine errors only', () => {
      expect(isTweenEngineError(new StaleHandleError('stale'))).toBe(true);
      expect(isTweenEngineError(new Error('plain'))).toBe(false);
      expect(isTweenEngineError('STALE_HANDLE')).toBe(false);
    });
  });
});
