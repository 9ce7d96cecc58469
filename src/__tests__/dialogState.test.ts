import { describe, it, expect } from 'vitest';
import { ButtonAction, ButtonState } from '@/lib/buttonState';
import { ConfirmationDialogState } from '@/lib/dialogState';
import { Hasher, hashValue, isEqual } from '@/lib/equality';
import { TextState } from '@/lib/textState';

type ItemAction = 'favoriteTapped' | 'deleteTapped';

function itemDialog(): ConfirmationDialogState<ItemAction> {
  return new ConfirmationDialogState<ItemAction>({
    title: 'What would you like to do?',
    buttons: [
      ButtonState.default('Favorite', ButtonAction.send('favoriteTapped')),
      ButtonState.destructive('Delete', ButtonAction.send('deleteTapped')),
      ButtonState.cancel('Cancel'),
    ],
  });
}

class Tag {
  constructor(readonly name: string) {}

  equals(other: unknown): boolean {
    return other instanceof Tag && other.name.toLowerCase() === this.name.toLowerCase();
  }

  hash(hasher: Hasher): void {
    hasher.combineString(this.name.toLowerCase());
  }
}

describe('ConfirmationDialogState', () => {
  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  it('defaults titleVisibility to automatic', () => {
    expect(itemDialog().titleVisibility).toBe('automatic');
  });

  it('defaults to no message and no buttons', () => {
    const dialog = new ConfirmationDialogState({ title: 'Heads up' });
    expect(dialog.message).toBeUndefined();
    expect(dialog.buttons).toEqual([]);
  });

  it('keeps the given title visibility', () => {
    const dialog = new ConfirmationDialogState({ title: 'Heads up', titleVisibility: 'hidden' });
    expect(dialog.titleVisibility).toBe('hidden');
  });

  it('preserves button order', () => {
    expect(itemDialog().buttons.map((b) => b.label.plainText)).toEqual(['Favorite', 'Delete', 'Cancel']);
  });

  it('copies the buttons array it is given', () => {
    const buttons = [ButtonState.cancel<ItemAction>('Cancel')];
    const dialog = new ConfirmationDialogState<ItemAction>({ title: 'Heads up', buttons });
    buttons.push(ButtonState.default<ItemAction>('Later'));
    expect(dialog.buttons).toHaveLength(1);
  });

  it('gives every value its own id', () => {
    expect(itemDialog().id).not.toBe(itemDialog().id);
  });

  // -------------------------------------------------------------------------
  // Equality & hashing
  // -------------------------------------------------------------------------

  it('equals an independently built dialog with the same content', () => {
    const a = itemDialog();
    const b = itemDialog();
    expect(a.id).not.toBe(b.id);
    expect(a.equals(b)).toBe(true);
    expect(isEqual(a, b)).toBe(true);
  });

  it('hashes consistently with equals', () => {
    const a = itemDialog();
    const b = itemDialog();
    expect(a.hashCode()).toBe(b.hashCode());
    expect(hashValue(a)).toBe(a.hashCode());
  });

  it('ignores title visibility in equality and hashing', () => {
    const visible = itemDialog().with({ titleVisibility: 'visible' });
    const hidden = itemDialog().with({ titleVisibility: 'hidden' });
    expect(visible.equals(hidden)).toBe(true);
    expect(visible.hashCode()).toBe(hidden.hashCode());
  });

  it('differs when the message differs', () => {
    const plain = itemDialog();
    expect(plain.equals(plain.with({ message: 'Pick one.' }))).toBe(false);
    expect(plain.with({ message: 'Pick one.' }).equals(plain.with({ message: 'Pick two.' }))).toBe(false);
  });

  it('differs when the title differs', () => {
    expect(itemDialog().equals(itemDialog().with({ title: TextState.of('What would you like to do?').bold() }))).toBe(
      false,
    );
  });

  it('differs when buttons are reordered', () => {
    const dialog = itemDialog();
    const reordered = dialog.with({ buttons: [...dialog.buttons].reverse() });
    expect(dialog.equals(reordered)).toBe(false);
  });

  it('uses Equatable actions for button comparison', () => {
    const make = (name: string) =>
      new ConfirmationDialogState<Tag>({
        title: 'Tag',
        buttons: [ButtonState.default('Apply', ButtonAction.send(new Tag(name)))],
      });
    expect(make('Urgent').equals(make('URGENT'))).toBe(true);
    expect(make('Urgent').hashCode()).toBe(make('URGENT').hashCode());
    expect(make('Urgent').equals(make('Later'))).toBe(false);
  });

  it('is not equal to other kinds of values', () => {
    expect(itemDialog().equals(null)).toBe(false);
    expect(itemDialog().equals({ title: 'What would you like to do?' })).toBe(false);
  });

  // -------------------------------------------------------------------------
  // Copies
  // -------------------------------------------------------------------------

  it('drops the message when with() is given null', () => {
    const withMessage = itemDialog().with({ message: 'Pick one.' });
    const cleared = withMessage.with({ message: null });
    expect(withMessage.message?.plainText).toBe('Pick one.');
    expect(cleared.message).toBeUndefined();
    expect(cleared.equals(itemDialog())).toBe(true);
  });

  it('gives copies a new id', () => {
    const dialog = itemDialog();
    expect(dialog.with({}).id).not.toBe(dialog.id);
    expect(dialog.with({}).equals(dialog)).toBe(true);
  });

  // -------------------------------------------------------------------------
  // Debug dump
  // -------------------------------------------------------------------------

  it('describes title, message and buttons', () => {
    expect(itemDialog().describe()).toBe(
      [
        'ConfirmationDialogState(',
        '  title: "What would you like to do?",',
        '  message: none,',
        '  buttons: [',
        '    Default("Favorite") → send(favoriteTapped),',
        '    Destructive("Delete") → send(deleteTapped),',
        '    Cancel("Cancel"),',
        '  ]',
        ')',
      ].join('\n'),
    );
  });

  it('describes an empty dialog', () => {
    expect(new ConfirmationDialogState({ title: 'Done', message: 'Saved.' }).describe()).toBe(
      ['ConfirmationDialogState(', '  title: "Done",', '  message: "Saved.",', '  buttons: []', ')'].join('\n'),
    );
  });
});
