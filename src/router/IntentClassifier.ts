import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { mapError } from '../errors/mapError.js';
import { DEFAULT_RULE, INTENT_RULES, type IntentRule } from './intentRules.js';
import type { IntentKind, SessionContext, TaskDescriptor, TaskParameters } from './taskTypes.js';

const logger = pino({ name: 'IntentClassifier' });

const SHIPPING_METHOD = /\b(eco|ground|express)\b/;
const PRODUCT_ID = /\bp-[a-z0-9]+(?:-[a-z0-9]+)*\b/g;
const AMOUNT = String.raw`\$?\s*(\d+(?:\.\d+)?)`;
const PRICE_BETWEEN = new RegExp(String.raw`\bbetween\s+${AMOUNT}\s+and\s+${AMOUNT}`);
const PRICE_MAX = new RegExp(String.raw`\b(?:under|below|less\s+than|cheaper\s+than|up\s+to|at\s+most|max(?:imum)?)\s+${AMOUNT}`);
const PRICE_MIN = new RegExp(String.raw`\b(?:over|above|more\s+than|at\s+least|min(?:imum)?)\s+${AMOUNT}`);
const PRICE_BARE = /\$\s*(\d+(?:\.\d+)?)/;

const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
};

const QUANTITY = new RegExp(String.raw`(?<![\w$.-])(\d{1,3}|${Object.keys(NUMBER_WORDS).join('|')})(?![\w.-])`);
const LEADING_FILLER = new RegExp(
  String.raw`^(?:a|an|the|some|my|this|that|these|those|please|x|\d{1,3}|${Object.keys(NUMBER_WORDS).join('|')})\s+`
);
const TRAILING_FILLER = /\s+(?:please|too|also|as\s+well|now)$/;
const CART_REFERENCE = /^(?:my\s+|the\s+)?(?:cart|basket|order)$/;

const REF_PATTERNS: Partial<Record<IntentKind, RegExp>> = {
  cart_add: /\b(?:add|put)\s+(.+?)(?:\s+(?:to|in|into|on)\s+(?:my\s+|the\s+)?(?:cart|basket))?$/,
  cart_remove: /\b(?:remove|delete|take\s+out)\s+(.+?)(?:\s+(?:from|of)\s+(?:my\s+|the\s+)?(?:cart|basket))?$/,
  footprint: /\b(?:footprint|co2|carbon|emissions?)\s+(?:of|for)\s+(.+)$/,
};

const QUERY_PREFIX =
  /^(?:please\s+)?(?:(?:can|could)\s+you\s+)?(?:find|search(?:\s+for)?|show(?:\s+me)?|look(?:ing)?\s+for|i'?m\s+looking\s+for|i\s+(?:want|need)|recommend|buy|browse|shop\s+for|compare)\s+/;

export interface IntentClassifierOptions {
  /** Known catalog categories, matched as whole words. */
  categories?: readonly string[];
}

export interface PriceRange {
  minPrice?: number;
  maxPrice?: number;
  /** The text with the matched price phrases removed. */
  rest: string;
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function stripPunctuation(text: string): string {
  return text.replace(/[.!?,;]+$/g, '').trim();
}

export function extractPriceRange(text: string): PriceRange {
  let rest = text;
  const range: PriceRange = { rest };

  const between = PRICE_BETWEEN.exec(rest);
  if (between) {
    const low = Number(between[1]);
    const high = Number(between[2]);
    range.minPrice = Math.min(low, high);
    range.maxPrice = Math.max(low, high);
    rest = rest.replace(between[0], ' ');
  } else {
    const max = PRICE_MAX.exec(rest);
    if (max) {
      range.maxPrice = Number(max[1]);
      rest = rest.replace(max[0], ' ');
    }
    const min = PRICE_MIN.exec(rest);
    if (min) {
      range.minPrice = Number(min[1]);
      rest = rest.replace(min[0], ' ');
    }
    if (range.maxPrice === undefined && range.minPrice === undefined) {
      const bare = PRICE_BARE.exec(rest);
      if (bare) {
        range.maxPrice = Number(bare[1]);
        rest = rest.replace(bare[0], ' ');
      }
    }
  }

  range.rest = rest.replace(/\s+/g, ' ').trim();
  return range;
}

export function extractQuantity(text: string): number | undefined {
  const match = QUANTITY.exec(text);
  if (!match) {
    return undefined;
  }
  const value = NUMBER_WORDS[match[1]] ?? Number(match[1]);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Strip articles, counts and politeness from a product reference. Returns
 * undefined when nothing that names a product is left.
 */
export function cleanProductRef(raw: string): string | undefined {
  let ref = stripPunctuation(raw);
  let previous = '';
  while (previous !== ref) {
    previous = ref;
    ref = ref.replace(LEADING_FILLER, '').replace(TRAILING_FILLER, '').trim();
  }
  if (ref.length === 0 || CART_REFERENCE.test(ref)) {
    return undefined;
  }
  return ref;
}

/**
 * Rule-based intent classifier.
 *
 * `classify` never throws: unmatched or unparseable input becomes a
 * `general` task with confidence 0.
 */
export class IntentClassifier {
  private readonly categories: readonly string[];

  constructor(options: IntentClassifierOptions = {}) {
    this.categories = (options.categories ?? []).map((category) => category.toLowerCase());
  }

  classify(text: string, context: SessionContext): TaskDescriptor {
    try {
      return this.classifyText(text, context);
    } catch (error) {
      logger.error({ error: mapError(error).message }, 'Classification failed; using the general handler');
      return this.describe(text, context, DEFAULT_RULE, {});
    }
  }

  private classifyText(text: string, context: SessionContext): TaskDescriptor {
    const normalized = normalize(text);
    const rule = normalized.length > 0 ? this.match(normalized) : DEFAULT_RULE;
    if (rule === DEFAULT_RULE) {
      return this.describe(text, context, rule, {});
    }

    const parameters = this.extractParameters(rule.intent, normalized);
    const descriptor = this.describe(text, context, rule, parameters);

    if (rule.intent === 'product_search' && context.cartItemCount > 0) {
      // Show how the cart footprint stands next to the search results.
      descriptor.workflow = 'parallel';
      descriptor.secondaryHandlers = ['footprint'];
    }
    if (rule.intent === 'compare' && (parameters.productIds?.length ?? 0) >= 2) {
      descriptor.workflow = 'sequential';
      descriptor.primaryHandler = 'comparison';
      descriptor.secondaryHandlers = [];
    }

    logger.debug(
      { intent: descriptor.intent, workflow: descriptor.workflow, handlers: [descriptor.primaryHandler, ...descriptor.secondaryHandlers] },
      'Message classified'
    );
    return descriptor;
  }

  private match(normalized: string): IntentRule {
    return INTENT_RULES.find((rule) => rule.pattern.test(normalized)) ?? DEFAULT_RULE;
  }

  private extractParameters(intent: IntentKind, normalized: string): TaskParameters {
    const parameters: TaskParameters = {};
    const { minPrice, maxPrice, rest } = extractPriceRange(normalized);
    const sentence = stripPunctuation(rest);

    const productIds = [...new Set(sentence.match(PRODUCT_ID) ?? [])];
    if (productIds.length === 1) {
      parameters.productId = productIds[0];
    } else if (productIds.length > 1) {
      parameters.productIds = productIds;
    }

    switch (intent) {
      case 'cart_add':
      case 'cart_remove': {
        const quantity = extractQuantity(sentence);
        if (quantity !== undefined) {
          parameters.quantity = quantity;
        }
        this.assignRef(parameters, intent, sentence);
        break;
      }
      case 'footprint':
        this.assignRef(parameters, intent, sentence);
        break;
      case 'shipping_select': {
        const method = SHIPPING_METHOD.exec(sentence);
        if (method) {
          parameters.shippingMethod = method[1];
        }
        break;
      }
      case 'product_search':
      case 'compare': {
        if (minPrice !== undefined) parameters.minPrice = minPrice;
        if (maxPrice !== undefined) parameters.maxPrice = maxPrice;
        const category = this.categories.find((name) =>
          new RegExp(String.raw`\b${name.replace(/s$/, '')}s?\b`).test(sentence)
        );
        if (category) {
          parameters.category = category;
        }
        const query = sentence.replace(QUERY_PREFIX, '').replace(/\b(?:compare|versus|vs\.?)\b/g, ' ');
        const trimmed = query.replace(/\s+/g, ' ').trim();
        if (trimmed.length > 0) {
          parameters.query = trimmed;
        }
        break;
      }
      default:
        break;
    }

    return parameters;
  }

  private assignRef(parameters: TaskParameters, intent: IntentKind, sentence: string): void {
    if (parameters.productId) {
      return;
    }
    const pattern = REF_PATTERNS[intent];
    const match = pattern?.exec(sentence);
    const ref = match ? cleanProductRef(match[1]) : undefined;
    if (ref) {
      parameters.productRef = ref;
    }
  }

  private describe(
    text: string,
    context: SessionContext,
    rule: IntentRule,
    parameters: TaskParameters
  ): TaskDescriptor {
    const [primaryHandler, ...secondaryHandlers] = rule.handlers;
    return {
      id: randomUUID(),
      originText: text,
      intent: rule.intent,
      confidence: rule.confidence,
      parameters,
      workflow: rule.workflow,
      primaryHandler: primaryHandler ?? DEFAULT_RULE.intent,
      secondaryHandlers,
      sessionId: context.sessionId,
      depth: 0,
    };
  }
}
