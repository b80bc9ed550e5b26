import { UNKNOWN_ATTRIBUTION, type MeterCategory } from '../../shared/costAllocation.js';

const NULL_LIKE = new Set(['', 'null', 'none', 'undefined', 'nan']);

export function normalizeResourceId(raw: string | null | undefined): string {
  const value = (raw ?? '').trim().toLowerCase();
  if (!value || value === UNKNOWN_ATTRIBUTION) {
    return UNKNOWN_ATTRIBUTION;
  }

  // e.g. /subscriptions/{sub}/resourceGroups/{rg}/providers/{provider}/accounts/{name}
  if (value.startsWith('/')) {
    const segments = value.split('/').filter(Boolean);
    return segments[segments.length - 1] ?? UNKNOWN_ATTRIBUTION;
  }

  // e.g. https://{name}.openai.example.com/deployments/...
  if (value.startsWith('http')) {
    try {
      const hostname = new URL(value).hostname;
      return hostname.split('.')[0] || UNKNOWN_ATTRIBUTION;
    } catch {
      return value;
    }
  }

  return value;
}

export function normalizeAttribution(raw: unknown): string {
  if (raw === null || raw === undefined) {
    return UNKNOWN_ATTRIBUTION;
  }

  const value = String(raw).trim();
  return NULL_LIKE.has(value.toLowerCase()) ? UNKNOWN_ATTRIBUTION : value;
}

function costTypeOf(meter: string): Pick<MeterCategory, 'costType' | 'isTokenBased'> {
  if (meter.includes('input') && meter.includes('token')) {
    return { costType: 'Input Tokens', isTokenBased: true };
  }
  if (meter.includes('output') && meter.includes('token')) {
    return { costType: 'Output Tokens', isTokenBased: true };
  }
  if (meter.includes('ptu') || meter.includes('provisioned')) {
    return { costType: 'Provisioned Throughput', isTokenBased: false };
  }
  if (meter.includes('fine-tuning')) {
    return { costType: 'Fine-tuning', isTokenBased: false };
  }
  if (meter.includes('training')) {
    return { costType: 'Training', isTokenBased: false };
  }
  return { costType: 'Unknown', isTokenBased: false };
}

// Most specific families first: "gpt-4o" must win over "gpt-4".
function modelFamilyOf(meter: string): string {
  if (meter.includes('gpt-5')) {
    if (meter.includes('preview')) {
      return 'GPT-5-Preview';
    }
    return meter.includes('turbo') ? 'GPT-5-Turbo' : 'GPT-5';
  }
  if (meter.includes('gpt-4')) {
    if (meter.includes('gpt-4o')) {
      return 'GPT-4o';
    }
    return meter.includes('turbo') ? 'GPT-4-Turbo' : 'GPT-4';
  }
  if (meter.includes('gpt-3.5') || meter.includes('gpt-35')) {
    return 'GPT-3.5-Turbo';
  }

  const legacy: Array<[string, string]> = [
    ['davinci', 'Davinci'],
    ['curie', 'Curie'],
    ['ada', 'Ada'],
    ['babbage', 'Babbage']
  ];
  return legacy.find(([needle]) => meter.includes(needle))?.[1] ?? 'Unknown';
}

export function categorizeMeter(meterName: string): MeterCategory {
  const meter = meterName.toLowerCase();
  return {
    ...costTypeOf(meter),
    modelFamily: modelFamilyOf(meter)
  };
}
