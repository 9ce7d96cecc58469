// =============================================================================
// Dialog State — Buttons
// =============================================================================
// A button is a role, a label and (optionally) the action it sends when
// tapped. A button without an action only dismisses the dialog.
// =============================================================================

import { BUTTON_ROLE_LABELS, type ButtonActionType, type ButtonRole } from '@shared/types/enums';
import { isEqual, type Equatable, type Hashable, type Hasher } from './equality';
import { TextState, type TextLike } from './textState';

// ---------------------------------------------------------------------------
// ButtonAction
// ---------------------------------------------------------------------------

export interface ButtonAction<Action> {
  readonly type: ButtonActionType;
  readonly action: Action;
}

export const ButtonAction = {
  send<Action>(action: Action): ButtonAction<Action> {
    return { type: 'send', action };
  },
};

/** Debug rendering of an action payload. */
export function describeAction(action: unknown): string {
  if (typeof action === 'string') return action;
  if (typeof action !== 'object' || action === null) return String(action);
  try {
    return JSON.stringify(action) ?? String(action);
  } catch {
    // Cyclic or BigInt-carrying payloads
    return String(action);
  }
}

// ---------------------------------------------------------------------------
// ButtonState
// ---------------------------------------------------------------------------

export interface ButtonStateInit<Action> {
  role?: ButtonRole;
  label: TextLike;
  action?: ButtonAction<Action>;
}

export class ButtonState<Action> implements Equatable, Hashable {
  readonly role: ButtonRole;
  readonly label: TextState;
  readonly action: ButtonAction<Action> | undefined;

  constructor({ role = 'default', label, action }: ButtonStateInit<Action>) {
    this.role = role;
    this.label = TextState.from(label);
    this.action = action;
  }

  static default<Action = never>(label: TextLike, action?: ButtonAction<Action>): ButtonState<Action> {
    return new ButtonState({ role: 'default', label, action });
  }

  static cancel<Action = never>(label: TextLike, action?: ButtonAction<Action>): ButtonState<Action> {
    return new ButtonState({ role: 'cancel', label, action });
  }

  static destructive<Action = never>(label: TextLike, action?: ButtonAction<Action>): ButtonState<Action> {
    return new ButtonState({ role: 'destructive', label, action });
  }

  /** Runs `perform` with the button's action, if it has one. */
  withAction(perform: (action: Action) => void): void {
    if (this.action?.type === 'send') {
      perform(this.action.action);
    }
  }

  equals(other: unknown): boolean {
    if (!(other instanceof ButtonState)) return false;
    if (this.role !== other.role || !this.label.equals(other.label)) return false;
    if (this.action === undefined || other.action === undefined) {
      return this.action === other.action;
    }
    return this.action.type === other.action.type && isEqual(this.action.action, other.action.action);
  }

  hash(hasher: Hasher): void {
    hasher.combineString('ButtonState').combineString(this.role);
    this.label.hash(hasher);
    if (this.action === undefined) {
      hasher.combineString('none');
    } else {
      hasher.combineString(this.action.type).combine(this.action.action);
    }
  }

  describe(): string {
    const head = `${BUTTON_ROLE_LABELS[this.role]}(${this.label.describe()})`;
    return this.action ? `${head} → ${this.action.type}(${describeAction(this.action.action)})` : head;
  }
}
