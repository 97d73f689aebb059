/**
 * Tests for the row grouping and table heuristics
 */
import { countTables, groupIntoRows, PositionedText, rowsToText } from '../utils/textLayout';

function item(text: string, x: number, y: number, width = text.length * 5, height = 10): PositionedText {
  return { text, x, y, width, height };
}

describe('groupIntoRows', () => {
  test('orders rows top down and items left to right', () => {
    const rows = groupIntoRows([
      item('world', 60, 700),
      item('second', 10, 680),
      item('hello', 10, 701),
    ]);
    expect(rowsToText(rows)).toBe('hello world\nsecond');
  });

  test('drops whitespace-only items', () => {
    const rows = groupIntoRows([item('  ', 10, 700), item('text', 30, 700)]);
    expect(rows).toHaveLength(1);
    expect(rows[0].items.map(i => i.text)).toEqual(['text']);
  });
});

describe('countTables', () => {
  const pageWidth = 600;

  test('finds aligned rows with two or more columns', () => {
    const rows = groupIntoRows([
      item('Weight', 50, 600), item('12 kg', 300, 600),
      item('Voltage', 50, 580), item('230 V', 300, 580),
      item('Power', 50, 560), item('40 W', 302, 560),
    ]);
    expect(countTables(rows, pageWidth)).toBe(1);
  });

  test('needs at least three rows', () => {
    const rows = groupIntoRows([
      item('Weight', 50, 600), item('12 kg', 300, 600),
      item('Voltage', 50, 580), item('230 V', 300, 580),
    ]);
    expect(countTables(rows, pageWidth)).toBe(0);
  });

  test('ignores prose split only by normal word spacing', () => {
    const rows = groupIntoRows([
      item('The', 50, 600, 15), item('pump', 68, 600, 20),
      item('is', 50, 580, 10), item('quiet', 63, 580, 25),
      item('and', 50, 560, 15), item('small', 68, 560, 25),
    ]);
    expect(countTables(rows, pageWidth)).toBe(0);
  });

  test('counts separate blocks', () => {
    const rows = groupIntoRows([
      item('A', 50, 700), item('1', 300, 700),
      item('B', 50, 680), item('2', 300, 680),
      item('C', 50, 660), item('3', 300, 660),
      item('A paragraph between the tables', 50, 600, 200),
      item('D', 50, 540), item('4', 400, 540),
      item('E', 50, 520), item('5', 400, 520),
      item('F', 50, 500), item('6', 400, 500),
    ]);
    expect(countTables(rows, pageWidth)).toBe(2);
  });
});
