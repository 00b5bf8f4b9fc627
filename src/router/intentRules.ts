import type { IntentKind, WorkflowPattern } from './taskTypes.js';

export interface IntentRule {
  intent: IntentKind;
  /** Tested against the lower-cased message. */
  pattern: RegExp;
  confidence: number;
  workflow: WorkflowPattern;
  /** Primary handler first, then secondaries in dispatch order. */
  handlers: string[];
}

/**
 * Ordered intent rules; the first match wins.
 *
 * Precedence, highest first:
 * 1. cart mutations and views, so "add the sunglasses to my cart" never
 *    reaches product search
 * 2. shipping choices
 * 3. payment, then checkout
 * 4. comparison and footprint questions
 * 5. generic product search
 *
 * Anything else goes to the general handler with confidence 0.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'cart_clear',
    pattern: /\b(clear|empty|reset)\b.*\b(cart|basket)\b/,
    confidence: 0.95,
    workflow: 'sequential',
    handlers: ['cart'],
  },
  {
    intent: 'cart_remove',
    pattern: /\b(remove|delete|take\s+out)\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['cart'],
  },
  {
    intent: 'cart_add',
    pattern: /\b(add|put)\b.+\b(cart|basket)\b|^\s*add\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['cart'],
  },
  {
    intent: 'cart_view',
    pattern: /\b(show|view|see|display|list|check|what'?s\s+in)\b.*\b(cart|basket)\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['cart'],
  },
  {
    intent: 'shipping_options',
    pattern: /\b(shipping|delivery)\s+options\b|\bhow\s+(can|do|will)\s+you\s+(ship|deliver)\b/,
    confidence: 0.85,
    workflow: 'sequential',
    handlers: ['footprint'],
  },
  {
    intent: 'shipping_select',
    pattern: /\b(eco|ground|express)\b.*\b(ship|shipping|delivery)\b|\b(ship|shipping|deliver|delivery)\b.*\b(eco|ground|express)\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['footprint', 'checkout'],
  },
  {
    intent: 'payment',
    pattern: /\b(pay|payment|place\s+(the\s+|my\s+)?order|complete\s+(the\s+|my\s+)?(order|purchase))\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['checkout'],
  },
  {
    intent: 'checkout',
    pattern: /\bcheck\s?out\b/,
    confidence: 0.9,
    workflow: 'sequential',
    handlers: ['checkout'],
  },
  {
    intent: 'compare',
    pattern: /\b(compare|comparison|versus|vs\.?)\b/,
    confidence: 0.8,
    workflow: 'hierarchical',
    handlers: ['discovery'],
  },
  {
    intent: 'footprint',
    pattern: /\b(footprint|co2|carbon|emissions?)\b/,
    confidence: 0.8,
    workflow: 'sequential',
    handlers: ['footprint'],
  },
  {
    intent: 'product_search',
    pattern: /\b(find|search|show|looking|look|recommend|buy|need|want|browse|any|shop)\b/,
    confidence: 0.7,
    workflow: 'sequential',
    handlers: ['discovery'],
  },
];

export const DEFAULT_RULE: IntentRule = {
  intent: 'general',
  pattern: /.*/,
  confidence: 0,
  workflow: 'sequential',
  handlers: ['general'],
};
