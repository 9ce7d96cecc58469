// =============================================================================
// Dialog State — Runtime Configuration
// =============================================================================
// Read once from the Vite env at module load.
//
//   VITE_DIALOG_STATE_DEBUG=true   log projections and button selections
// =============================================================================

export const config = {
  debug: import.meta.env.VITE_DIALOG_STATE_DEBUG === 'true',
  /** Label of the fallback button rendered when a dialog has none. */
  fallbackDismissLabel: 'OK',
} as const;
