import type { ReactNode } from 'react';
import * as AlertDialogPrimitive from '@radix-ui/react-alert-dialog';
import * as VisuallyHidden from '@radix-ui/react-visually-hidden';
import { cn } from '@/lib/utils';
import { config } from '@/lib/config';
import { buttonVariants, type ButtonVariant } from '@/components/ui/button';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Whether the title row is drawn. `hidden` keeps the title for screen readers
 * (Radix requires one) but removes it visually.
 */
export const ALERT_DIALOG_TITLE_VISIBILITIES = ['automatic', 'visible', 'hidden'] as const;
export type AlertDialogTitleVisibility = (typeof ALERT_DIALOG_TITLE_VISIBILITIES)[number];

export interface AlertDialogButton {
  key: string;
  label: ReactNode;
  /** `cancel` renders in the primitive's cancel slot (initial focus, Esc). */
  kind: 'action' | 'cancel';
  variant: Extract<ButtonVariant, 'default' | 'destructive'>;
  /** Runs before the dialog closes. */
  onSelect: () => void;
}

export interface AlertDialogProps {
  open: boolean;
  onOpenChange: (open: boolean) => void;
  title: ReactNode;
  description?: ReactNode;
  titleVisibility?: AlertDialogTitleVisibility;
  buttons: readonly AlertDialogButton[];
}

const FALLBACK_BUTTONS: readonly AlertDialogButton[] = [
  {
    key: 'dismiss',
    label: config.fallbackDismissLabel,
    kind: 'cancel',
    variant: 'default',
    onSelect: () => {},
  },
];

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function AlertDialog({
  open,
  onOpenChange,
  title,
  description,
  titleVisibility = 'automatic',
  buttons,
}: AlertDialogProps) {
  const titleNode = (
    <AlertDialogPrimitive.Title className="text-lg font-semibold">{title}</AlertDialogPrimitive.Title>
  );
  const rendered = buttons.length > 0 ? buttons : FALLBACK_BUTTONS;

  return (
    <AlertDialogPrimitive.Root open={open} onOpenChange={onOpenChange}>
      <AlertDialogPrimitive.Portal>
        <AlertDialogPrimitive.Overlay
          className="fixed inset-0 z-50 bg-black/80 data-[state=open]:animate-in data-[state=closed]:animate-out data-[state=closed]:fade-out-0 data-[state=open]:fade-in-0"
        />
        <AlertDialogPrimitive.Content
          className="fixed left-[50%] top-[50%] z-50 grid w-full max-w-lg translate-x-[-50%] translate-y-[-50%] gap-4 border bg-background p-6 shadow-lg duration-200 data-[state=open]:animate-in data-[state=closed]:animate-out data-[state=closed]:fade-out-0 data-[state=open]:fade-in-0 data-[state=closed]:zoom-out-95 data-[state=open]:zoom-in-95 sm:rounded-lg"
          data-title-visibility={titleVisibility}
          {...(description === undefined ? { 'aria-describedby': undefined } : {})}
        >
          <div className="flex flex-col space-y-2 text-center sm:text-left">
            {titleVisibility === 'hidden' ? <VisuallyHidden.Root>{titleNode}</VisuallyHidden.Root> : titleNode}
            {description !== undefined && (
              <AlertDialogPrimitive.Description className="text-sm text-muted-foreground">
                {description}
              </AlertDialogPrimitive.Description>
            )}
          </div>
          <div className="flex flex-col-reverse sm:flex-row sm:justify-end sm:space-x-2">
            {rendered.map((button) =>
              button.kind === 'cancel' ? (
                <AlertDialogPrimitive.Cancel
                  key={button.key}
                  className={cn(buttonVariants({ variant: 'outline' }), 'mt-2 sm:mt-0')}
                  data-kind={button.kind}
                  data-variant={button.variant}
                  onClick={button.onSelect}
                >
                  {button.label}
                </AlertDialogPrimitive.Cancel>
              ) : (
                <AlertDialogPrimitive.Action
                  key={button.key}
                  className={cn(buttonVariants({ variant: button.variant }))}
                  data-kind={button.kind}
                  data-variant={button.variant}
                  onClick={button.onSelect}
                >
                  {button.label}
                </AlertDialogPrimitive.Action>
              ),
            )}
          </div>
        </AlertDialogPrimitive.Content>
      </AlertDialogPrimitive.Portal>
    </AlertDialogPrimitive.Root>
  );
}
