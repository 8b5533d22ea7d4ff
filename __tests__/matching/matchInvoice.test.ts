/**
 * Tests for invoice matching
 */

import { findPartialMatches, matchInvoice } from '../../src/matching/matchInvoice';
import type { PendingInvoice } from '../../src/matching';

const invoice = (invoiceId: string, resourceName: string | null): PendingInvoice => ({
  invoiceId,
  resourceName,
  payPeriodStart: '2025-03-01',
  payPeriodEnd: '2025-03-31',
  vendorHours: 40,
  approvalStatus: 'pending',
  division: null,
  clientName: null,
  projectNameExcel: null,
});

describe('matchInvoice', () => {
  const janeDoe = invoice('INV-A', 'Doe, Jane Marie');
  const johnSmith = invoice('INV-B', 'John Smith');
  const smithJohnA = invoice('INV-C', 'Smith, John A');
  const jonSmith = invoice('INV-D', 'Jon Smith');

  describe('full-name pass', () => {
    it('should match a unique candidate containing every token', () => {
      expect(matchInvoice('Jane', 'Doe', [janeDoe, johnSmith])).toEqual({
        kind: 'matched',
        invoice: janeDoe,
      });
    });

    it('should report several full matches as ambiguous', () => {
      expect(matchInvoice('John', 'Smith', [johnSmith, smithJohnA])).toEqual({
        kind: 'ambiguous',
        candidates: [johnSmith, smithJohnA],
      });
    });

    it('should require whole-word tokens, so "jon" does not contain "john"', () => {
      expect(matchInvoice('John', 'Smith', [johnSmith, jonSmith])).toEqual({
        kind: 'matched',
        invoice: johnSmith,
      });
    });

    it('should require every token of a multi-word first name', () => {
      const maryLee = invoice('INV-E', 'Mary Lee');

      expect(matchInvoice('Mary Ann', 'Lee', [maryLee])).toEqual({
        kind: 'needs_approval',
        invoice: maryLee,
      });
    });

    it('should match a multi-word first name whose words appear in another order', () => {
      const mariaAnna = invoice('INV-F', 'Smith, Maria Anna');

      expect(matchInvoice('Anna Maria', 'Smith', [mariaAnna, johnSmith])).toEqual({
        kind: 'matched',
        invoice: mariaAnna,
      });
    });
  });

  describe('partial pass', () => {
    it('should flag a unique partial match for approval', () => {
      expect(matchInvoice('Janet', 'Doe', [janeDoe, johnSmith])).toEqual({
        kind: 'needs_approval',
        invoice: janeDoe,
      });
    });

    it('should report several partial matches as ambiguous', () => {
      expect(matchInvoice('Mary', 'Smith', [janeDoe, johnSmith, smithJohnA])).toEqual({
        kind: 'ambiguous',
        candidates: [johnSmith, smithJohnA],
      });
    });
  });

  describe('no match', () => {
    it('should return unmatched when no token appears', () => {
      expect(matchInvoice('Unknown', 'Person', [janeDoe, johnSmith])).toEqual({ kind: 'unmatched' });
    });

    it('should return unmatched when the name has no usable tokens', () => {
      expect(matchInvoice('J', '', [janeDoe, johnSmith])).toEqual({ kind: 'unmatched' });
    });

    it('should not match on a prefix of a longer word', () => {
      expect(matchInvoice('Ann', 'Lee', [invoice('INV-F', 'Annabel Leeson')])).toEqual({
        kind: 'unmatched',
      });
    });

    it('should skip invoices without a usable resource name', () => {
      expect(matchInvoice('Jane', 'Doe', [invoice('INV-G', null), invoice('INV-H', '---')])).toEqual({
        kind: 'unmatched',
      });
    });

    it('should return unmatched against an empty pool', () => {
      expect(matchInvoice('Jane', 'Doe', [])).toEqual({ kind: 'unmatched' });
    });
  });
});

describe('findPartialMatches', () => {
  const pool = [invoice('INV-A', 'Doe, Jane Marie'), invoice('INV-B', 'John Smith'), invoice('INV-C', 'Will Doe')];

  it('should return every invoice sharing a token', () => {
    expect(findPartialMatches('Janet', 'Doe', pool).map((match) => match.invoiceId)).toEqual([
      'INV-A',
      'INV-C',
    ]);
  });

  it('should return nothing for unknown or tokenless names', () => {
    expect(findPartialMatches('Unknown', 'Person', pool)).toEqual([]);
    expect(findPartialMatches('', 'X', pool)).toEqual([]);
  });
});
