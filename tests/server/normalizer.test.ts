// @vitest-environment node
import { describe, expect, it } from 'vitest';
import { categorizeMeter, normalizeAttribution, normalizeResourceId } from '../../src/server/engine/normalizer.js';

describe('resource and attribution normalization', () => {
  it('reduces hierarchical resource paths to their last segment', () => {
    expect(
      normalizeResourceId(
        '/subscriptions/abc/resourceGroups/retail/providers/Microsoft.CognitiveServices/accounts/Retail-OpenAI'
      )
    ).toBe('retail-openai');
    expect(normalizeResourceId('/accounts/retail-openai/')).toBe('retail-openai');
  });

  it('reduces endpoint urls to the first host label', () => {
    expect(normalizeResourceId('https://Retail-OpenAI.openai.azure.com/openai/deployments/gpt-4o')).toBe('retail-openai');
  });

  it('falls back to the lower-cased input when a url cannot be parsed', () => {
    expect(normalizeResourceId('HTTP//broken')).toBe('http//broken');
  });

  it('maps empty and unknown identifiers to the sentinel', () => {
    expect(normalizeResourceId('')).toBe('unknown');
    expect(normalizeResourceId(null)).toBe('unknown');
    expect(normalizeResourceId('  UNKNOWN ')).toBe('unknown');
    expect(normalizeResourceId(' Retail-OpenAI ')).toBe('retail-openai');
  });

  it('treats null-like device and store values as unknown', () => {
    [null, undefined, '', '  ', 'None', 'NULL', 'undefined', 'NaN'].forEach((value) => {
      expect(normalizeAttribution(value)).toBe('unknown');
    });
    expect(normalizeAttribution(' pos-01 ')).toBe('pos-01');
    expect(normalizeAttribution(42)).toBe('42');
  });
});

describe('meter categorization', () => {
  it('derives cost type and model family from the meter name', () => {
    expect(categorizeMeter('GPT-4o Input Tokens')).toEqual({
      costType: 'Input Tokens',
      isTokenBased: true,
      modelFamily: 'GPT-4o'
    });
    expect(categorizeMeter('gpt-4-turbo output tokens')).toEqual({
      costType: 'Output Tokens',
      isTokenBased: true,
      modelFamily: 'GPT-4-Turbo'
    });
    expect(categorizeMeter('GPT-5 Preview PTU')).toEqual({
      costType: 'Provisioned Throughput',
      isTokenBased: false,
      modelFamily: 'GPT-5-Preview'
    });
  });

  it('checks the most specific model family first', () => {
    expect(categorizeMeter('gpt-35-turbo fine-tuning hosting').modelFamily).toBe('GPT-3.5-Turbo');
    expect(categorizeMeter('gpt-35-turbo fine-tuning hosting').costType).toBe('Fine-tuning');
    expect(categorizeMeter('gpt-4 8k input tokens').modelFamily).toBe('GPT-4');
    expect(categorizeMeter('text-davinci training hours')).toEqual({
      costType: 'Training',
      isTokenBased: false,
      modelFamily: 'Davinci'
    });
  });

  it('falls back to Unknown for unrecognised meters', () => {
    expect(categorizeMeter('Standard Storage')).toEqual({ costType: 'Unknown', isTokenBased: false, modelFamily: 'Unknown' });
  });
});
