import { randomBytes } from 'crypto';

function randomSuffix(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/**
 * Generates a component ID from its class name (e.g., 'EditorView_3fa94c1e').
 */
export function generateComponentId(className: string): string {
  const base = className.trim() || 'Component';
  return `${base}_${randomSuffix(8)}`;
}

/**
 * Generates an event ID (e.g., 'event:1712345678901-9f2c4b7a').
 */
export function generateEventId(timestamp: number = Date.now()): string {
  return `event:${timestamp}-${randomSuffix(8)}`;
}

/**
 * Generates a handler subscription ID (e.g., 'subscription:1712345678901-1a2b3c4d5').
 */
export function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${randomSuffix(9)}`;
}
