/**
 * Span Reference Resolvers
 *
 * Each store registers a resolver under its `SpanRef.kind`. Worker
 * bootstraps resolve the reference they receive into a live span.
 */

import { UnknownSpanRefError } from '../errors/index.js';
import type { Span, SpanRef, SpanResolver } from './types.js';

const resolvers = new Map<string, SpanResolver>();

/**
 * Register the resolver for a store kind, replacing any previous one
 */
export function registerSpanResolver(kind: string, resolver: SpanResolver): void {
  resolvers.set(kind, resolver);
}

/**
 * Remove the resolver for a store kind
 */
export function unregisterSpanResolver(kind: string): boolean {
  return resolvers.delete(kind);
}

/**
 * Kinds with a registered resolver
 */
export function listSpanResolverKinds(): string[] {
  return [...resolvers.keys()].sort();
}

/**
 * Rebuild a live span from its reference
 *
 * @throws UnknownSpanRefError when no resolver handles `ref.kind`
 */
export async function resolveSpanRef(ref: SpanRef): Promise<Span> {
  const resolver = resolvers.get(ref.kind);
  if (!resolver) {
    throw new UnknownSpanRefError(ref.kind, listSpanResolverKinds());
  }
  return resolver(ref);
}
