// =============================================================================
// Dialog State — Enums
// =============================================================================
// String literal unions so values survive a JSON round trip unchanged.
// =============================================================================

// --- ButtonState.role ---
export const BUTTON_ROLES = ['default', 'cancel', 'destructive'] as const;
export type ButtonRole = (typeof BUTTON_ROLES)[number];

// --- ConfirmationDialogState.titleVisibility ---
export const TITLE_VISIBILITIES = ['automatic', 'hidden', 'visible'] as const;
export type TitleVisibility = (typeof TITLE_VISIBILITIES)[number];

// --- ButtonAction.type ---
export const BUTTON_ACTION_TYPES = ['send'] as const;
export type ButtonActionType = (typeof BUTTON_ACTION_TYPES)[number];

// --- TextStyle.fontWeight ---
export const FONT_WEIGHTS = [
  'ultraLight',
  'thin',
  'light',
  'regular',
  'medium',
  'semibold',
  'bold',
  'heavy',
  'black',
] as const;
export type FontWeight = (typeof FONT_WEIGHTS)[number];

// =============================================================================
// Display labels (debug dumps)
// =============================================================================

export const BUTTON_ROLE_LABELS: Record<ButtonRole, string> = {
  default: 'Default',
  cancel: 'Cancel',
  destructive: 'Destructive',
};

/** CSS numeric weights, used when rendering styled text. */
export const FONT_WEIGHT_VALUES: Record<FontWeight, number> = {
  ultraLight: 100,
  thin: 200,
  light: 300,
  regular: 400,
  medium: 500,
  semibold: 600,
  bold: 700,
  heavy: 800,
  black: 900,
};
