import { describe, it, expect, vi } from 'vitest';
import { ButtonAction, ButtonState, describeAction } from '@/lib/buttonState';
import { hashValue } from '@/lib/equality';
import { TextState } from '@/lib/textState';

type ItemAction = 'favoriteTapped' | 'deleteTapped';
type RowAction = { type: 'delete'; id: number };

describe('ButtonState', () => {
  it('defaults to the default role', () => {
    expect(new ButtonState({ label: 'OK' }).role).toBe('default');
  });

  it('builds each role from its factory', () => {
    expect(ButtonState.default('Favorite').role).toBe('default');
    expect(ButtonState.cancel('Cancel').role).toBe('cancel');
    expect(ButtonState.destructive('Delete').role).toBe('destructive');
  });

  it('lifts string labels to TextState', () => {
    expect(ButtonState.cancel('Cancel').label.equals(TextState.of('Cancel'))).toBe(true);
  });

  it('sends its action through withAction', () => {
    const perform = vi.fn();
    const button = ButtonState.destructive<ItemAction>('Delete', ButtonAction.send('deleteTapped'));
    button.withAction(perform);
    expect(perform).toHaveBeenCalledOnce();
    expect(perform).toHaveBeenCalledWith('deleteTapped');
  });

  it('does nothing in withAction when it has no action', () => {
    const perform = vi.fn();
    ButtonState.cancel<ItemAction>('Cancel').withAction(perform);
    expect(perform).not.toHaveBeenCalled();
  });

  it('compares role, label and action', () => {
    const a = ButtonState.default<ItemAction>('Favorite', ButtonAction.send('favoriteTapped'));
    expect(a.equals(ButtonState.default<ItemAction>('Favorite', ButtonAction.send('favoriteTapped')))).toBe(true);
    expect(a.equals(ButtonState.destructive<ItemAction>('Favorite', ButtonAction.send('favoriteTapped')))).toBe(false);
    expect(a.equals(ButtonState.default<ItemAction>('Star', ButtonAction.send('favoriteTapped')))).toBe(false);
    expect(a.equals(ButtonState.default<ItemAction>('Favorite', ButtonAction.send('deleteTapped')))).toBe(false);
    expect(a.equals(ButtonState.default<ItemAction>('Favorite'))).toBe(false);
  });

  it('compares object actions structurally', () => {
    const a = ButtonState.destructive<RowAction>('Delete', ButtonAction.send({ type: 'delete', id: 4 }));
    const b = ButtonState.destructive<RowAction>('Delete', ButtonAction.send({ id: 4, type: 'delete' }));
    expect(a.equals(b)).toBe(true);
    expect(hashValue(a)).toBe(hashValue(b));
  });

  it('describes role, label and action', () => {
    expect(ButtonState.destructive<ItemAction>('Delete', ButtonAction.send('deleteTapped')).describe()).toBe(
      'Destructive("Delete") → send(deleteTapped)',
    );
    expect(ButtonState.cancel('Cancel').describe()).toBe('Cancel("Cancel")');
  });
});

describe('describeAction', () => {
  it('renders objects as JSON', () => {
    expect(describeAction({ type: 'delete', id: 4 })).toBe('{"type":"delete","id":4}');
  });

  it('falls back to String() for payloads JSON cannot encode', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(describeAction(cyclic)).toBe('[object Object]');
  });

  it('renders primitives directly', () => {
    expect(describeAction(42)).toBe('42');
    expect(describeAction(undefined)).toBe('undefined');
  });
});
