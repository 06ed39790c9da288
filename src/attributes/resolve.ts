import type {SpanAttributes} from '../types';
import type {AttributePlan, AttributeSource, AttributeSpec} from './types';

import {extractMessage, has} from '../utils';

/**
 * Raised when an attribute cannot be resolved: the configured function is missing,
 * throws, or returns something other than a string.
 */
export class AttributeResolutionError extends Error {
  readonly attribute: string;

  constructor(attribute: string, message: string, options?: {cause?: unknown}) {
    super(`Attribute "${attribute}": ${message}`, options);
    this.name = 'AttributeResolutionError';
    this.attribute = attribute;
  }
}

function isSourceList(spec: AttributeSpec): spec is readonly AttributeSource[] {
  return Array.isArray(spec);
}

function keyOf(source: AttributeSource) {
  return typeof source === 'string' ? source : source.fn;
}

function entries(spec: AttributeSpec): Array<[string, AttributeSource]> {
  if (isSourceList(spec)) {
    return spec.map(source => [keyOf(source), source]);
  }

  return Object.entries(spec);
}

const BUILTIN_PROTOTYPES: ReadonlySet<unknown> = new Set([Object.prototype, Function.prototype]);

/** @internal True if `prop` is defined by `target` or its own classes, not by a builtin prototype. */
function definedBy(target: object, prop: string) {
  for (
    let current: unknown = target;
    typeof current === 'object' || typeof current === 'function';
    current = Object.getPrototypeOf(current)
  ) {
    if (current === null || BUILTIN_PROTOTYPES.has(current)) {
      return false;
    }
    if (Object.hasOwn(current, prop)) {
      return true;
    }
  }

  return false;
}

/** @internal Binds a source to its target function, or throws if there is none. */
function bind(key: string, source: AttributeSource, owner: object | undefined) {
  const local = typeof source === 'string';
  const target = local ? owner : source.module;
  const fn = local ? source : source.fn;
  const args = local ? [] : source.args || [];

  if (!has(target, fn, 'function') || !definedBy(target, fn)) {
    throw new AttributeResolutionError(
      key,
      local ? `owner has no function "${fn}"` : `module has no function "${fn}"`,
    );
  }

  const resolver = target[fn];
  return (req: unknown): unknown => resolver.call(target, req, ...args);
}

/**
 * Validates an attribute spec and binds every source to its function.
 *
 * @param spec - Attribute configuration
 * @param owner - Object holding the functions named by local (string) sources
 * @throws {AttributeResolutionError} If a source names no function, or two sources share a key
 */
export function compileAttributes(spec: AttributeSpec = [], owner?: object): AttributePlan {
  const seen = new Set<string>();

  return entries(spec).map(([key, source]) => {
    if (seen.has(key)) {
      throw new AttributeResolutionError(key, 'configured more than once');
    }
    seen.add(key);

    return {key, resolve: bind(key, source, owner)};
  });
}

/**
 * Computes attribute values for a request, in plan order.
 *
 * @throws {AttributeResolutionError} If a resolver throws (original error as `cause`)
 *   or returns a non-string value
 */
export function applyAttributePlan(req: unknown, plan: AttributePlan): SpanAttributes {
  const attributes: SpanAttributes = {};

  for (const {key, resolve} of plan) {
    let value: unknown;
    try {
      value = resolve(req);
    } catch (error) {
      throw new AttributeResolutionError(key, extractMessage(error), {cause: error});
    }

    if (typeof value !== 'string') {
      throw new AttributeResolutionError(key, `expected a string, got ${typeof value}`);
    }

    attributes[key] = value;
  }

  return attributes;
}

/**
 * One-shot resolution: compiles `spec` against `owner` and applies it to `req`.
 */
export function resolveAttributes(req: unknown, spec: AttributeSpec, owner?: object) {
  return applyAttributePlan(req, compileAttributes(spec, owner));
}
