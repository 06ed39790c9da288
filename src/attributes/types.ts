/**
 * A function on `module` called with the request, optionally followed by `args`.
 *
 * - `{module, fn}` calls `module[fn](req)`
 * - `{module, fn, args}` calls `module[fn](req, ...args)`
 */
export type RemoteSource = {
  module: object;
  fn: string;
  args?: readonly unknown[];
};

/**
 * Where an attribute value comes from.
 *
 * A plain string names a one-argument function on the owner passed to the middleware.
 */
export type AttributeSource = string | RemoteSource;

/**
 * Attribute configuration.
 *
 * - Array form: keys are taken from the source (the local name or `fn`).
 * - Record form: keys are given explicitly.
 *
 * @example
 * ```typescript
 * const spec: AttributeSpec = ['method', {module: geo, fn: 'region'}];
 * const keyed: AttributeSpec = {
 *   'http.method': 'method',
 *   tenant: {module: headers, fn: 'read', args: ['x-tenant']},
 * };
 * ```
 */
export type AttributeSpec =
  | readonly AttributeSource[]
  | Readonly<Record<string, AttributeSource>>;

/** A validated attribute spec, ready to be applied to requests. */
export type AttributePlan = ReadonlyArray<{
  key: string;
  resolve: (req: unknown) => unknown;
}>;
