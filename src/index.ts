// =============================================================================
// Dialog State — Public API
// =============================================================================

export * from '@shared/types/enums';
export { Hasher, hashValue, isEqual, isEquatable, isHashable } from './lib/equality';
export type { Equatable, Hashable } from './lib/equality';
export { TextState } from './lib/textState';
export type { TextLike, TextRun, TextStyle } from './lib/textState';
export { ButtonAction, ButtonState, describeAction } from './lib/buttonState';
export type { ButtonStateInit } from './lib/buttonState';
export { ConfirmationDialogState } from './lib/dialogState';
export type { ConfirmationDialogInit } from './lib/dialogState';
export {
  buttonStateSchema,
  dialogStateSchema,
  parseDialogState,
  serializeButtonState,
  serializeDialogState,
  serializeTextState,
  textStateSchema,
} from './lib/schemas';
export type { ActionSchema, ButtonStateJSON, DialogStateJSON, TextStateJSON } from './lib/schemas';
export { AlertDialog, ALERT_DIALOG_TITLE_VISIBILITIES } from './components/ui/alert-dialog';
export type { AlertDialogButton, AlertDialogProps, AlertDialogTitleVisibility } from './components/ui/alert-dialog';
export { TextView, textStyleToCss } from './components/TextView';
export { toAlertDialogButton, toAlertDialogProps, toAlertDialogTitleVisibility } from './components/dialogPresentation';
export type { AlertDialogContentProps } from './components/dialogPresentation';
