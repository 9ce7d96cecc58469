// =============================================================================
// Dialog State — ConfirmationDialogState
// =============================================================================
// Describes a confirmation dialog as data so application logic can decide
// when it is shown, what it says and what each button sends, and tests can
// assert on it directly:
//
//   type ItemAction = 'favoriteTapped' | 'deleteTapped';
//
//   model.dialog = new ConfirmationDialogState<ItemAction>({
//     title: 'What would you like to do?',
//     buttons: [
//       ButtonState.default('Favorite', ButtonAction.send('favoriteTapped')),
//       ButtonState.destructive('Delete', ButtonAction.send('deleteTapped')),
//       ButtonState.cancel('Cancel'),
//     ],
//   });
//
// The state lives in the application (null when no dialog is showing) and is
// cleared once a button has been handled.
//
// Equality and hashing look at title, message and buttons only. The id is
// fresh per value and titleVisibility is a presentation hint, so neither
// takes part.
// =============================================================================

import type { TitleVisibility } from '@shared/types/enums';
import { ButtonState } from './buttonState';
import { Hasher, isEqual, type Equatable, type Hashable } from './equality';
import { TextState, type TextLike } from './textState';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConfirmationDialogInit<Action> {
  title: TextLike;
  titleVisibility?: TitleVisibility;
  message?: TextLike | null;
  buttons?: readonly ButtonState<Action>[];
}

function newId(): string {
  try {
    return crypto.randomUUID();
  } catch {
    // Hosts without crypto.randomUUID (older jsdom, insecure contexts)
    return `dlg-${Date.now()}-${Math.random().toString(16).slice(2)}`;
  }
}

// ---------------------------------------------------------------------------
// ConfirmationDialogState
// ---------------------------------------------------------------------------

export class ConfirmationDialogState<Action> implements Equatable, Hashable {
  readonly id: string = newId();
  readonly title: TextState;
  readonly message: TextState | undefined;
  readonly titleVisibility: TitleVisibility;
  readonly buttons: readonly ButtonState<Action>[];

  constructor({ title, titleVisibility = 'automatic', message, buttons = [] }: ConfirmationDialogInit<Action>) {
    this.title = TextState.from(title);
    this.message = message == null ? undefined : TextState.from(message);
    this.titleVisibility = titleVisibility;
    this.buttons = [...buttons];
  }

  /**
   * Copy with some fields replaced. Pass `message: null` to drop the message.
   * The copy is a new dialog and gets a new id.
   */
  with(changes: Partial<ConfirmationDialogInit<Action>>): ConfirmationDialogState<Action> {
    return new ConfirmationDialogState<Action>({
      title: changes.title ?? this.title,
      titleVisibility: changes.titleVisibility ?? this.titleVisibility,
      message: changes.message !== undefined ? changes.message : this.message,
      buttons: changes.buttons ?? this.buttons,
    });
  }

  equals(other: unknown): boolean {
    if (!(other instanceof ConfirmationDialogState)) return false;
    return (
      this.title.equals(other.title) &&
      isEqual(this.message, other.message) &&
      isEqual(this.buttons, other.buttons)
    );
  }

  hash(hasher: Hasher): void {
    hasher.combineString('ConfirmationDialogState');
    hasher.combine(this.title).combine(this.message).combine(this.buttons);
  }

  hashCode(): number {
    const hasher = new Hasher();
    this.hash(hasher);
    return hasher.finalize();
  }

  /** Multi-line debug dump. Leaves out the id. */
  describe(): string {
    const lines = [
      'ConfirmationDialogState(',
      `  title: ${this.title.describe()},`,
      `  message: ${this.message ? this.message.describe() : 'none'},`,
    ];
    if (this.buttons.length === 0) {
      lines.push('  buttons: []');
    } else {
      lines.push('  buttons: [');
      for (const button of this.buttons) lines.push(`    ${button.describe()},`);
      lines.push('  ]');
    }
    lines.push(')');
    return lines.join('\n');
  }
}
