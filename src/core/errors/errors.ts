/**
 * Standard facets and the error definitions of each boundary.
 */

import { ErrFacet, ScalerError } from './scaler-error.js';

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker('NotFound');

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker('BadInput');

/** An external process failed or answered with something unusable */
export const ExternalFailure = ErrFacet.marker('ExternalFailure');

// ============================================================================
// Boundaries
// ============================================================================

export const Niri = ScalerError.boundary('niri');
export const Resolve = ScalerError.boundary('resolve');
export const Scale = ScalerError.boundary('scale');

// ============================================================================
// niri
// ============================================================================

/** The compositor process exited non-zero, timed out, or produced no output */
export const ErrExternalToolFailure = Niri.define('external_tool_failure', {
  customProps: ErrFacet.props<{ command: string; exitCode: number | null; stderr: string; reason: string }>(),
  facets: [ExternalFailure],
  message: (d) => `\`${d.command}\` ${d.reason}`,
});

/** The compositor answered, but not with the JSON document we asked for */
export const ErrInvalidResponse = Niri.define('invalid_response', {
  customProps: ErrFacet.props<{ message: string; issues: string[] }>(),
  facets: [ExternalFailure],
  message: (d) => `Unexpected response to "${d.message}": ${d.issues.join('; ')}`,
});

// ============================================================================
// resolve
// ============================================================================

export const ErrNoFocusedOutput = Resolve.define('no_focused_output', {
  facets: [NotFound],
  message: () => 'No focused output!',
});

export const ErrUnknownOutput = Resolve.define('unknown_output', {
  customProps: ErrFacet.props<{ output: string; known: string[] }>(),
  facets: [NotFound, BadInput],
  message: (d) =>
    d.known.length > 0
      ? `Could not find an output named ${d.output} (known outputs: ${d.known.join(', ')})`
      : `Could not find an output named ${d.output}`,
});

/** Output exists but has no logical record, so it has no scale to cycle */
export const ErrOutputDisabled = Resolve.define('output_disabled', {
  customProps: ErrFacet.props<{ output: string }>(),
  facets: [BadInput],
  message: (d) => `Output ${d.output} is disabled and has no logical scale`,
});

// ============================================================================
// scale
// ============================================================================

export const ErrInvalidArgument = Scale.define('invalid_argument', {
  customProps: ErrFacet.props<{ argument: string; value: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid ${d.argument}: ${d.value}`,
});
