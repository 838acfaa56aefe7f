import * as cheerio from 'cheerio';
import { FIELD_DEFINITIONS } from '@/config/constants';
import { DeviceConfig, FieldLocator } from '@/types/device.types';
import { FetchedDocument } from '@/types/fetch.types';
import {
  FieldDefinition,
  FieldValues,
  MEASUREMENT_FIELDS,
  MeasurementField,
  Reading,
} from '@/types/measurement.types';
import { getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { isRecord } from '@/utils/object.utils';
import { coerceNumeric, escapeRegExp, parseFirstNumber } from '@/utils/number.utils';

export type ExtractionStrategyName = 'structured' | 'locator' | 'pattern';

export interface ExtractionResult {
  reading: Reading;
  sources: Partial<Record<MeasurementField, ExtractionStrategyName>>;
  missing: MeasurementField[];
}

// Parsed once per document and shared by every strategy
interface DocumentContext {
  $: cheerio.CheerioAPI | null;
  payloads: unknown[];
  text: string;
}

interface ExtractionStrategy {
  name: ExtractionStrategyName;
  extract(context: DocumentContext, field: MeasurementField, locator?: FieldLocator): number | null;
}

const MAX_PAYLOAD_DEPTH = 12;
const ASSIGNED_PAYLOAD = /=\s*(\{[\s\S]*\}|\[[\s\S]*\])\s*;?\s*$/;

const tryParseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

/**
 * Inline <script> blocks that carry data: plain JSON bodies
 * (application/json, ld+json) or `window.state = {...};` assignments.
 */
const collectScriptPayloads = ($: cheerio.CheerioAPI): unknown[] => {
  const payloads: unknown[] = [];

  $('script').each((_, element) => {
    const raw = ($(element).html() ?? '').trim();
    if (!raw) {
      return;
    }

    const direct = raw.startsWith('{') || raw.startsWith('[') ? tryParseJson(raw) : undefined;
    if (direct !== undefined) {
      payloads.push(direct);
      return;
    }

    const assigned = ASSIGNED_PAYLOAD.exec(raw);
    const parsed = assigned ? tryParseJson(assigned[1]) : undefined;
    if (parsed !== undefined) {
      payloads.push(parsed);
    }
  });

  return payloads;
};

// Visible text in document order, element boundaries kept as whitespace
const collectVisibleText = ($: cheerio.CheerioAPI): string => {
  const body = $('body').clone();
  body.find('script, style, noscript, template').remove();
  body.find('*').each((_, element) => {
    $(element).prepend(' ').append(' ');
  });
  return body.text().replace(/\s+/g, ' ').trim();
};

const buildContext = (document: FetchedDocument): DocumentContext | null => {
  const body = document.body.trim();
  if (!body) {
    return null;
  }

  if (document.kind === 'json') {
    const parsed = tryParseJson(body);
    if (parsed === undefined) {
      return null;
    }
    return { $: null, payloads: [parsed], text: body };
  }

  const $ = cheerio.load(body);
  return { $, payloads: collectScriptPayloads($), text: collectVisibleText($) };
};

const findKeyDeep = (node: unknown, key: string, depth = 0): unknown => {
  if (depth > MAX_PAYLOAD_DEPTH) {
    return undefined;
  }

  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findKeyDeep(item, key, depth + 1);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  if (!isRecord(node)) {
    return undefined;
  }

  const wanted = key.toLowerCase();
  for (const [name, value] of Object.entries(node)) {
    if (name.toLowerCase() === wanted) {
      return value;
    }
  }

  for (const value of Object.values(node)) {
    const found = findKeyDeep(value, key, depth + 1);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
};

const resolveJsonPath = (node: unknown, path: string): unknown => {
  let current: unknown = node;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
};

// Payloads often wrap a reading as { value: 12.3, unit: "mm" }
const toNumber = (value: unknown): number | null => {
  if (isRecord(value) && 'value' in value) {
    return coerceNumeric(value.value);
  }
  return coerceNumeric(value);
};

// `<label>[:] <number><unit>`; the unit suffix is required
const buildFieldPattern = (definition: FieldDefinition): RegExp => {
  const labels = definition.aliases.map(escapeRegExp).join('|');
  const units = definition.units.map(escapeRegExp).join('|');
  return new RegExp(
    `\\b(?:${labels})\\b\\s*[:=]?\\s*([-+]?(?:\\d+(?:\\.\\d*)?|\\.\\d+))\\s*(?:${units})(?![a-z])`,
    'i'
  );
};

const FIELD_PATTERNS: Record<MeasurementField, RegExp> = {
  depth_mm: buildFieldPattern(FIELD_DEFINITIONS.depth_mm),
  velocity_mps: buildFieldPattern(FIELD_DEFINITIONS.velocity_mps),
  flow_lps: buildFieldPattern(FIELD_DEFINITIONS.flow_lps),
};

const structuredLookup: ExtractionStrategy = {
  name: 'structured',
  extract(context, field, locator) {
    const keys = [locator?.key, ...FIELD_DEFINITIONS[field].payload_keys].filter(
      (key): key is string => typeof key === 'string' && key.length > 0
    );

    for (const payload of context.payloads) {
      for (const key of keys) {
        const value = toNumber(findKeyDeep(payload, key));
        if (value !== null) {
          return value;
        }
      }
    }
    return null;
  },
};

const locatorLookup: ExtractionStrategy = {
  name: 'locator',
  extract(context, _field, locator) {
    if (!locator) {
      return null;
    }

    if (locator.selector && context.$) {
      const node = context.$(locator.selector).first();
      const text = node.text().trim() || node.attr('value') || node.attr('data-value') || '';
      const value = parseFirstNumber(text);
      if (value !== null) {
        return value;
      }
    }

    if (locator.json_path) {
      for (const payload of context.payloads) {
        const value = toNumber(resolveJsonPath(payload, locator.json_path));
        if (value !== null) {
          return value;
        }
      }
    }
    return null;
  },
};

const patternScan: ExtractionStrategy = {
  name: 'pattern',
  extract(context, field) {
    const match = FIELD_PATTERNS[field].exec(context.text);
    return match ? parseFirstNumber(match[1]) : null;
  },
};

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  structuredLookup,
  locatorLookup,
  patternScan,
];

export const emptyFieldValues = (): FieldValues => ({
  depth_mm: null,
  velocity_mps: null,
  flow_lps: null,
});

/**
 * Turn a fetched document into a Reading. Each field runs the strategy
 * chain independently; a strategy that throws is treated as a miss.
 * Fields no strategy can resolve stay null. Without a parseable
 * document the reading is all-null with fetch_success = false.
 */
export const extractReading = (
  device: DeviceConfig,
  document: FetchedDocument | null,
  observedAt: Date = new Date()
): ExtractionResult => {
  const fields = emptyFieldValues();
  const context = document ? buildContext(document) : null;

  if (!context) {
    if (document) {
      logger.warn(`Unparseable ${document.kind} document from ${device.device_id}`);
    }
    return {
      reading: { device_id: device.device_id, observed_at: observedAt, fields, fetch_success: false },
      sources: {},
      missing: [...MEASUREMENT_FIELDS],
    };
  }

  const sources: ExtractionResult['sources'] = {};
  const missing: MeasurementField[] = [];

  for (const field of MEASUREMENT_FIELDS) {
    const locator = device.locators[field];

    for (const strategy of EXTRACTION_STRATEGIES) {
      let value: number | null = null;
      try {
        value = strategy.extract(context, field, locator);
      } catch (error) {
        logger.debug(`${strategy.name} lookup of ${field} failed for ${device.device_id}: ${getErrorMessage(error)}`);
      }

      if (value !== null) {
        fields[field] = value;
        sources[field] = strategy.name;
        break;
      }
    }

    if (fields[field] === null) {
      missing.push(field);
    }
  }

  if (missing.length > 0) {
    logger.warn(`Could not extract ${missing.join(', ')} for ${device.device_id}`);
  }

  return {
    reading: {
      device_id: device.device_id,
      observed_at: document?.fetched_at ?? observedAt,
      fields,
      fetch_success: true,
    },
    sources,
    missing,
  };
};
