// =============================================================================
// Dialog State — Host Projection
// =============================================================================
// Turns a ConfirmationDialogState into props for the Radix-backed AlertDialog.
// Pure: no state, no effects. Opening and clearing the dialog is up to the
// caller.
//
//   <AlertDialog
//     open={dialog !== null}
//     onOpenChange={(open) => { if (!open) setDialog(null); }}
//     {...toAlertDialogProps(dialog, handleAction)}
//   />
// =============================================================================

import type { TitleVisibility } from '@shared/types/enums';
import type { ButtonState } from '@/lib/buttonState';
import type { ConfirmationDialogState } from '@/lib/dialogState';
import { config } from '@/lib/config';
import type { AlertDialogButton, AlertDialogProps, AlertDialogTitleVisibility } from '@/components/ui/alert-dialog';
import { TextView } from '@/components/TextView';

export type AlertDialogContentProps = Pick<AlertDialogProps, 'title' | 'description' | 'titleVisibility' | 'buttons'>;

export function toAlertDialogTitleVisibility(visibility: TitleVisibility): AlertDialogTitleVisibility {
  switch (visibility) {
    case 'automatic':
      return 'automatic';
    case 'hidden':
      return 'hidden';
    case 'visible':
      return 'visible';
  }
}

export function toAlertDialogButton<Action>(
  button: ButtonState<Action>,
  send: (action: Action) => void,
  index: number,
): AlertDialogButton {
  return {
    key: `${index}-${button.role}`,
    label: <TextView text={button.label} />,
    kind: button.role === 'cancel' ? 'cancel' : 'action',
    variant: button.role === 'destructive' ? 'destructive' : 'default',
    onSelect: () => {
      if (config.debug) console.debug('[dialog-state] Button selected:', button.describe());
      button.withAction(send);
    },
  };
}

export function toAlertDialogProps<Action>(
  state: ConfirmationDialogState<Action>,
  send: (action: Action) => void,
): AlertDialogContentProps {
  const cancelCount = state.buttons.filter((b) => b.role === 'cancel').length;
  if (cancelCount > 1) {
    console.warn(`[dialog-state] Dialog "${state.title.plainText}" has ${cancelCount} cancel buttons`);
  }
  if (config.debug) console.debug('[dialog-state] Presenting:\n' + state.describe());

  return {
    title: <TextView text={state.title} />,
    description: state.message ? <TextView text={state.message} /> : undefined,
    titleVisibility: toAlertDialogTitleVisibility(state.titleVisibility),
    buttons: state.buttons.map((button, index) => toAlertDialogButton(button, send, index)),
  };
}
