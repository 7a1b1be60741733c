/**
 * ScalerError - Errors composed from facets and owned by boundaries.
 *
 * A boundary is a domain ("niri", "resolve", "scale"). Errors defined through a
 * boundary get the code `<domain>.<name>`, a set of marker facets and typed data.
 * Callers discriminate by exact code (`ErrorDef.is`), by facet (`ScalerError.has`)
 * or by domain (`err.domain`).
 */

import { StaticTypeCompanion } from '../companion.js';

// ============================================================================
// Facets
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: 'marker';
  readonly name: string;
}

/** Phantom type carrier for error-local data */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: 'props';
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T extends Record<string, unknown>> ? T : {};

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: 'marker' as const, name });
  },

  /** Declare the data an error carries (phantom type only) */
  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: 'props' };
  },
});

// ============================================================================
// Interfaces
// ============================================================================

export interface ScalerError<D extends Record<string, unknown> = Record<string, unknown>> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: D;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: ScalerError;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface ErrorDef<D extends Record<string, unknown> = {}> {
  readonly code: string;
  readonly domain: string;
  readonly facets: readonly ErrMarkerFacet[];
  create(data: D, cause?: ScalerError): ScalerError<D>;
  is(err: unknown): err is ScalerError<D>;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<P extends ErrProps<Record<string, unknown>> = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: readonly ErrMarkerFacet[]; message: (data: InferPropsData<P>) => string },
  ): ErrorDef<InferPropsData<P>>;
}

// ============================================================================
// Implementation (internal)
// ============================================================================

class ScalerErrorImpl<D extends Record<string, unknown>> extends Error implements ScalerError<D> {
  readonly code: string;
  readonly domain: string;
  readonly data: D;
  readonly facetNames: ReadonlySet<string>;
  override cause?: ScalerError;

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: D,
    cause?: ScalerError,
  ) {
    super(message);
    this.name = `ScalerError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.data = { ...data };
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const color = opts?.color ?? false;
    const red = color ? '\x1b[31m' : '';
    const dim = color ? '\x1b[2m' : '';
    const reset = color ? '\x1b[0m' : '';

    const lines = [formatErrorLine(this, '', { red, dim, reset })];

    let current = this.cause;
    let indent = '  ';
    while (current) {
      lines.push(`${indent}${dim}└ caused by:${reset} ${formatErrorLine(current, indent, { red, dim, reset })}`);
      current = current.cause;
      indent += '  ';
    }

    if (opts?.includeStackTrace && this.stack) {
      const first = this.stack.indexOf('\n    at ');
      if (first !== -1) {
        lines.push(`  ${dim}➝ Stack trace:${reset}`);
        for (const frame of this.stack.slice(first + 1).split('\n')) {
          if (frame.trim()) lines.push(`${dim}${frame}${reset}`);
        }
      }
    }

    return lines.join('\n');
  }
}

function formatErrorLine(
  err: ScalerError,
  indent: string,
  c: { red: string; dim: string; reset: string },
): string {
  let line = `${c.red}${err.code}${c.reset}: ${err.message}`;
  if (Object.keys(err.data).length > 0) {
    line += `\n${indent}  ${c.dim}data: ${JSON.stringify(err.data)}${c.reset}`;
  }
  return line;
}

function defineError<D extends Record<string, unknown>>(
  code: string,
  domain: string,
  opts: { facets: readonly ErrMarkerFacet[]; message: (data: D) => string },
): ErrorDef<D> {
  const facetNames: ReadonlySet<string> = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: D, cause?: ScalerError): ScalerError<D> {
    const err = new ScalerErrorImpl(code, domain, opts.message(data), facetNames, data, cause);
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    domain,
    facets: opts.facets,
    create,
    is(err: unknown): err is ScalerError<D> {
      return err instanceof ScalerErrorImpl && err.code === code;
    },
  });
}

// ============================================================================
// Companion
// ============================================================================

export const ScalerError = StaticTypeCompanion({
  /** Create an error boundary for a domain. */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<P extends ErrProps<Record<string, unknown>> = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: readonly ErrMarkerFacet[]; message: (data: InferPropsData<P>) => string },
      ): ErrorDef<InferPropsData<P>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },
    };
  },

  /** Check if a ScalerError carries a facet. False for anything else. */
  has(err: unknown, facet: ErrMarkerFacet): err is ScalerError {
    return err instanceof ScalerErrorImpl && err.facetNames.has(facet.name);
  },

  /**
   * Convert any thrown value to a ScalerError, preserving its stack.
   * ScalerErrors are returned unchanged.
   */
  wrap(thrown: unknown): ScalerError {
    if (thrown instanceof ScalerErrorImpl) return thrown;
    const message = thrown instanceof Error ? thrown.message : String(thrown);
    const wrapped = new ScalerErrorImpl('unknown', 'unknown', message, new Set<string>(), {});
    if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
    return wrapped;
  },
});
