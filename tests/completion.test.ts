import { describe, it, expect } from '@jest/globals';
import { extractJson, unavailableCompletion } from '../src/clients/completion';
import { CompletionError } from '../src/errors';

describe('extractJson', () => {
  it('should parse raw JSON', () => {
    expect(extractJson('{"audience": "gym members"}')).toEqual({ audience: 'gym members' });
  });

  it('should parse JSON inside a code block', () => {
    expect(extractJson('```json\n{"matches": []}\n```')).toEqual({ matches: [] });
    expect(extractJson('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it('should find JSON embedded in prose', () => {
    expect(extractJson('Sure! Here it is: {"offer": "Free class"} Enjoy.')).toEqual({
      offer: 'Free class',
    });
  });

  it('should return undefined when nothing parses', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('{"broken": ')).toBeUndefined();
  });
});

describe('unavailableCompletion', () => {
  it('should fail every call', async () => {
    await expect(unavailableCompletion('anything')).rejects.toThrow(CompletionError);
    await expect(unavailableCompletion('anything')).rejects.toThrow(
      'No completion service is configured'
    );
  });
});
