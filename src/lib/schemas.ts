// =============================================================================
// Dialog State — Wire Format (Zod)
// =============================================================================
// JSON shapes for persisting a dialog or receiving one from a server, and the
// schemas that hydrate them back into value types.
//
// Usage:
//   const ItemAction = z.enum(['favoriteTapped', 'deleteTapped']);
//   const dialog = parseDialogState(json, ItemAction);
//   if (!dialog) { /* logged; payload rejected */ }
//
//   const json = serializeDialogState(dialog);  // no id, safe to store
// =============================================================================

import { z } from 'zod';
import {
  BUTTON_ACTION_TYPES,
  BUTTON_ROLES,
  FONT_WEIGHTS,
  TITLE_VISIBILITIES,
  type ButtonActionType,
  type ButtonRole,
  type TitleVisibility,
} from '@shared/types/enums';
import { ButtonAction, ButtonState } from './buttonState';
import { ConfirmationDialogState } from './dialogState';
import { TextState, type TextStyle } from './textState';

// ---------------------------------------------------------------------------
// JSON types
// ---------------------------------------------------------------------------

export type TextStateJSON = string | { runs: { text: string; style?: TextStyle }[] };

export interface ButtonStateJSON<Action> {
  role: ButtonRole;
  label: TextStateJSON;
  action?: { type: ButtonActionType; action: Action };
}

export interface DialogStateJSON<Action> {
  title: TextStateJSON;
  message?: TextStateJSON;
  titleVisibility: TitleVisibility;
  buttons: ButtonStateJSON<Action>[];
}

/** Any zod schema whose parsed value is an Action, whatever its input. */
export type ActionSchema<Action> = z.ZodType<Action, z.ZodTypeDef, unknown>;

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

const textStyleSchema = z
  .object({
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    strikethrough: z.boolean().optional(),
    monospaced: z.boolean().optional(),
    fontWeight: z.enum(FONT_WEIGHTS).optional(),
    foregroundColor: z.string().optional(),
    kerning: z.number().finite().optional(),
  })
  .strict();

export const textStateSchema = z
  .union([
    z.string(),
    z.object({
      runs: z.array(z.object({ text: z.string(), style: textStyleSchema.optional() })),
    }),
  ])
  .transform((json) =>
    typeof json === 'string'
      ? new TextState(json)
      : new TextState(json.runs.map((run) => ({ text: run.text, style: run.style ?? {} }))),
  );

// ---------------------------------------------------------------------------
// Buttons
// ---------------------------------------------------------------------------

const buttonJsonSchema = z.object({
  role: z.enum(BUTTON_ROLES).default('default'),
  label: textStateSchema,
  action: z.object({ type: z.enum(BUTTON_ACTION_TYPES), action: z.unknown() }).optional(),
});

export function buttonStateSchema<Action>(actionSchema: ActionSchema<Action>) {
  return buttonJsonSchema.transform((json, ctx): ButtonState<Action> => {
    if (json.action === undefined) {
      return new ButtonState<Action>({ role: json.role, label: json.label });
    }
    const parsed = actionSchema.safeParse(json.action.action);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: ['action', 'action', ...issue.path],
        });
      }
      return z.NEVER;
    }
    return new ButtonState({ role: json.role, label: json.label, action: ButtonAction.send(parsed.data) });
  });
}

// ---------------------------------------------------------------------------
// Dialog
// ---------------------------------------------------------------------------

const dialogJsonSchema = z.object({
  title: textStateSchema,
  message: textStateSchema.nullish(),
  titleVisibility: z.enum(TITLE_VISIBILITIES).default('automatic'),
  buttons: z.array(z.unknown()).default([]),
});

export function dialogStateSchema<Action>(actionSchema: ActionSchema<Action>) {
  const buttonSchema = buttonStateSchema(actionSchema);

  return dialogJsonSchema.transform((json, ctx): ConfirmationDialogState<Action> => {
    const buttons: ButtonState<Action>[] = [];
    json.buttons.forEach((raw, index) => {
      const parsed = buttonSchema.safeParse(raw);
      if (parsed.success) {
        buttons.push(parsed.data);
        return;
      }
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: ['buttons', index, ...issue.path],
        });
      }
    });
    if (buttons.length !== json.buttons.length) return z.NEVER;

    return new ConfirmationDialogState<Action>({
      title: json.title,
      message: json.message,
      titleVisibility: json.titleVisibility,
      buttons,
    });
  });
}

/**
 * Hydrates a dialog from untrusted JSON. Returns null (and logs) when the
 * payload does not match.
 */
export function parseDialogState<Action>(
  json: unknown,
  actionSchema: ActionSchema<Action>,
): ConfirmationDialogState<Action> | null {
  const result = dialogStateSchema(actionSchema).safeParse(json);
  if (!result.success) {
    console.warn('[dialog-state] Invalid dialog payload:', result.error.message);
    return null;
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeTextState(text: TextState): TextStateJSON {
  const [only] = text.runs;
  if (text.runs.length === 1 && only !== undefined && text.isPlain) {
    return only.text;
  }
  return {
    runs: text.runs.map((run) =>
      Object.keys(run.style).length > 0 ? { text: run.text, style: { ...run.style } } : { text: run.text },
    ),
  };
}

export function serializeButtonState<Action>(button: ButtonState<Action>): ButtonStateJSON<Action> {
  const json: ButtonStateJSON<Action> = { role: button.role, label: serializeTextState(button.label) };
  if (button.action) {
    json.action = { type: button.action.type, action: button.action.action };
  }
  return json;
}

export function serializeDialogState<Action>(state: ConfirmationDialogState<Action>): DialogStateJSON<Action> {
  const json: DialogStateJSON<Action> = {
    title: serializeTextState(state.title),
    titleVisibility: state.titleVisibility,
    buttons: state.buttons.map(serializeButtonState),
  };
  if (state.message) {
    json.message = serializeTextState(state.message);
  }
  return json;
}
