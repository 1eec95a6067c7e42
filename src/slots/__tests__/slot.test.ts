import { describe, expect, it, vi } from 'vitest';
import { ImmutableSlotError, ResolutionError, ValidationError, RegistrationError } from '../../errors.js';
import { Composite, defineComposite, slotTable, type SlotTable } from '../composite.js';
import { slot } from '../slot.js';

let created = 0;

const positive = slot<number>({ default: 1 }).withParser((_owner, raw) => {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError('size', `expected a positive number, got ${String(raw)}`);
  }
  return value;
});

class Widget extends Composite {
  static slots: SlotTable = {
    title: slot({ default: 'untitled' }),
    tags: slot<string[]>({
      factory: () => {
        created++;
        return [];
      },
    }),
    size: positive,
    id: slot<string>().asWriteOnce(),
    cache: slot<number | undefined>({ copiable: false }),
  };
  declare title: string;
  declare tags: string[];
  declare size: number;
  declare id: string;
  declare cache: number | undefined;
}
defineComposite(Widget, { scope: 'test' });

class Gadget extends Widget {
  static slots = {
    title: slot({ default: 'gadget' }),
    power: slot({ default: 0 }),
  };
  declare power: number;
}
defineComposite(Gadget, { scope: 'test' });

describe('Slot', () => {
  it('returns the static default while nothing is stored', () => {
    const widget = new Widget();
    expect(widget.title).toBe('untitled');
    expect(widget.size).toBe(1);
    expect(widget.id).toBeUndefined();
  });

  it('calls the factory once per instance and keeps its result', () => {
    const before = created;
    const widget = new Widget();
    const first = widget.tags;
    first.push('a');
    expect(widget.tags).toBe(first);
    expect(widget.tags).toEqual(['a']);
    expect(created).toBe(before + 1);

    const other = new Widget();
    expect(other.tags).toEqual([]);
    expect(created).toBe(before + 2);
  });

  it('does not count factory seeding as an assignment', () => {
    const widget = new Widget();
    void widget.tags;
    expect(Widget.slots.tags.isAssigned(widget, 'tags')).toBe(false);
    widget.tags = ['b'];
    expect(Widget.slots.tags.isAssigned(widget, 'tags')).toBe(true);
  });

  it('runs the parser on every assignment', () => {
    const widget = new Widget({ size: '4' });
    expect(widget.size).toBe(4);
    expect(() => {
      widget.size = -2;
    }).toThrow(ValidationError);
    expect(widget.size).toBe(4);
  });

  it('rejects a second assignment of a write-once slot, even with the same value', () => {
    const widget = new Widget({ id: 'w-1' });
    expect(() => {
      widget.id = 'w-1';
    }).toThrow(ImmutableSlotError);
    expect(() => widget.setSlot('id', 'w-2')).toThrow('Slot "Widget.id" is write-once and has already been assigned');
    expect(widget.id).toBe('w-1');
  });

  it('notifies observers in registration order with previous and next values', () => {
    const calls: string[] = [];
    const base = slot({ default: 0 });
    const watched = base
      .observe((_owner, previous, next) => calls.push(`first ${String(previous)}->${next}`))
      .observe((_owner, previous, next) => calls.push(`second ${String(previous)}->${next}`));

    class Counter extends Composite {
      static slots = { count: watched };
      declare count: number;
    }
    defineComposite(Counter, { scope: 'test' });

    const counter = new Counter();
    counter.count = 3;
    counter.count = 7;
    expect(calls).toEqual(['first 0->3', 'second 0->3', 'first 3->7', 'second 3->7']);
    expect(base.observerCount).toBe(0);
    expect(watched.observerCount).toBe(2);
  });

  it('keeps the stored value when an observer throws and skips later observers', () => {
    const later = vi.fn();
    const guarded = slot({ default: '' })
      .observe(() => {
        throw new Error('rejected');
      })
      .observe(later);

    class Note extends Composite {
      static slots = { text: guarded };
      declare text: string;
    }
    defineComposite(Note, { scope: 'test' });

    const note = new Note();
    expect(() => {
      note.text = 'hello';
    }).toThrow('rejected');
    expect(note.text).toBe('hello');
    expect(later).not.toHaveBeenCalled();
  });

  it('removes an observer with unobserve', () => {
    const observer = vi.fn();
    const observed = slot({ default: 0 }).observe(observer);
    expect(observed.unobserve(observer).observerCount).toBe(0);
  });

  it('runs post-init once, on the first read of an unset slot', () => {
    const hook = vi.fn((owner: Composite) => owner.setSlot('other', 'seeded'));

    class Lazy extends Composite {
      static slots = {
        value: slot<number>({ default: 5 }).withPostInit(hook),
        other: slot({ default: '' }),
      };
      declare value: number;
      declare other: string;
    }
    defineComposite(Lazy, { scope: 'test' });

    const lazy = new Lazy();
    expect(hook).not.toHaveBeenCalled();
    expect(lazy.value).toBe(5);
    expect(lazy.value).toBe(5);
    expect(hook).toHaveBeenCalledTimes(1);
    expect(lazy.other).toBe('seeded');

    const assigned = new Lazy({ value: 2 });
    expect(assigned.value).toBe(2);
    expect(hook).toHaveBeenCalledTimes(1);
  });

  it('builds independent slots from a template', () => {
    const template = slot({ default: 1 });
    const changed = template.withDefault(2).asCopiable(false).asWriteOnce();
    expect(template.defaultValue).toBe(1);
    expect(template.copiable).toBe(true);
    expect(template.writeOnce).toBe(false);
    expect(changed.defaultValue).toBe(2);
    expect(changed.copiable).toBe(false);
    expect(changed.writeOnce).toBe(true);
  });
});

describe('Composite', () => {
  it('resolves inherited slots with subclass overrides', () => {
    expect([...slotTable(Gadget).keys()]).toEqual(['title', 'tags', 'size', 'id', 'cache', 'power']);
    const gadget = new Gadget();
    expect(gadget.title).toBe('gadget');
    expect(gadget.size).toBe(1);
    expect(gadget.qualifiedName).toBe('test.Gadget');
  });

  it('rejects undeclared names in the initializer and in setSlot', () => {
    expect(() => new Widget({ colour: 'red' })).toThrow(ResolutionError);
    expect(() => new Widget().getSlot('colour')).toThrow('Cannot resolve "test.Widget": no slot named "colour"');
  });

  it('rejects reserved slot names at definition', () => {
    class Broken extends Composite {
      static slots = { __type__: slot({ default: '' }) };
    }
    expect(() => defineComposite(Broken)).toThrow(RegistrationError);
  });
});
