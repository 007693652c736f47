import { describe, expect, it } from 'vitest';
import { LabelTable, labelName } from './labels';

describe('LabelTable', () => {
  it('names labels after their lowercase hex address', () => {
    expect(labelName(0x401a2f)).toBe('label_401a2f');
  });

  it('keeps one label per address', () => {
    const labels = new LabelTable();
    expect(labels.insert(0x1008)).toBe('label_1008');
    expect(labels.insert(0x1008)).toBe('label_1008');
    expect(labels.size).toBe(1);
    expect(labels.has(0x1008)).toBe(true);
    expect(labels.nameAt(0x1008)).toBe('label_1008');
    expect(labels.nameAt(0x1009)).toBeUndefined();
  });

  it('lists entries in address order', () => {
    const labels = new LabelTable();
    labels.insert(0x30);
    labels.insert(0x10);
    labels.insert(0x20);
    expect(labels.entries()).toEqual([
      [0x10, 'label_10'],
      [0x20, 'label_20'],
      [0x30, 'label_30'],
    ]);
    labels.clear();
    expect(labels.size).toBe(0);
  });
});
