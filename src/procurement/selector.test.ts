import { describe, it, expect } from 'vitest';
import { selectQuote } from './selector';
import { makeQuote } from '../testing/fixtures';

describe('selectQuote', () => {
  it('reports no quotes for an empty list', () => {
    expect(selectQuote([])).toEqual({ kind: 'no-quotes' });
  });

  it('picks the lowest total and reports the gap to the highest', () => {
    const selection = selectQuote([
      makeQuote({ vendorId: 'V001', totalCost: 5000 }),
      makeQuote({ vendorId: 'V002', totalCost: 4000 }),
      makeQuote({ vendorId: 'V003', totalCost: 4500.5 }),
    ]);

    expect(selection.kind).toBe('selected');
    if (selection.kind !== 'selected') return;
    expect(selection.winner.vendorId).toBe('V002');
    expect(selection.savings).toBe(1000);
    expect(selection.ranked.map((q) => q.vendorId)).toEqual(['V002', 'V003', 'V001']);
  });

  it('has zero savings for a single quote', () => {
    const selection = selectQuote([makeQuote({ totalCost: 1234.56 })]);
    expect(selection).toMatchObject({ kind: 'selected', savings: 0 });
  });

  it('keeps input order on equal totals', () => {
    const selection = selectQuote([
      makeQuote({ vendorId: 'V003', totalCost: 3000 }),
      makeQuote({ vendorId: 'V001', totalCost: 3000 }),
    ]);
    expect(selection.kind === 'selected' && selection.winner.vendorId).toBe('V003');
  });

  it('does not reorder the caller array', () => {
    const quotes = [makeQuote({ vendorId: 'V001', totalCost: 9 }), makeQuote({ vendorId: 'V002', totalCost: 1 })];
    selectQuote(quotes);
    expect(quotes.map((q) => q.vendorId)).toEqual(['V001', 'V002']);
  });
});
