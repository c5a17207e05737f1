import { describe, expect, it } from 'vitest';
import { sampleScript } from '../../testing/fakes';
import { parseTemplateData, scriptDocumentSchema, scriptToNarration } from '../scriptDocument';

describe('scriptDocumentSchema', () => {
  it('accepts a well-formed script and defaults metadata', () => {
    const { metadata: _metadata, ...withoutMetadata } = sampleScript('Tides');
    const parsed = scriptDocumentSchema.parse(withoutMetadata);
    expect(parsed.metadata).toEqual({});
    expect(parsed.sections).toHaveLength(2);
  });

  it('tolerates up to 30 seconds between the total and the section sum', () => {
    expect(scriptDocumentSchema.safeParse({ ...sampleScript('Tides'), total_duration_seconds: 90 }).success).toBe(true);
    const result = scriptDocumentSchema.safeParse({ ...sampleScript('Tides'), total_duration_seconds: 91 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('Total duration does not match sum of section durations');
    expect(result.error.issues[0]?.path).toEqual(['total_duration_seconds']);
  });

  it('rejects an empty section list', () => {
    const result = scriptDocumentSchema.safeParse({ ...sampleScript('Tides'), sections: [] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('Script must have at least one section');
  });

  it('rejects sections shorter than one second', () => {
    const script = sampleScript('Tides');
    const result = scriptDocumentSchema.safeParse({
      ...script,
      sections: [{ ...script.sections[0], duration_seconds: 0 }],
    });
    expect(result.success).toBe(false);
  });
});

describe('parseTemplateData', () => {
  it('returns typed template data', () => {
    expect(parseTemplateData({ sections: [{ type: 'intro', duration: 30, template: 'Welcome to {topic}' }] })).toEqual({
      sections: [{ type: 'intro', duration: 30, template: 'Welcome to {topic}' }],
    });
  });

  it('returns null for unusable template data', () => {
    expect(parseTemplateData({ sections: [] })).toBeNull();
    expect(parseTemplateData('not an object')).toBeNull();
  });
});

describe('scriptToNarration', () => {
  it('joins section contents with blank lines', () => {
    expect(scriptToNarration(sampleScript('Tides'))).toBe('Welcome to the show.\n\nHere is the main idea.');
  });
});
