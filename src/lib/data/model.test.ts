import { describe, it, expect } from 'vitest';
import { toDecimal } from '../decimal';
import { gainPerUnit, totalGain, type Lot } from './model';

const lot: Lot = {
    id: 'A#1',
    symbol: 'A',
    quantity: toDecimal(10),
    unitCost: toDecimal('100.5'),
    acquiredAt: new Date(2021, 0, 1),
};

describe('Lot helpers', () => {
    it('computes gain per unit', () => {
        expect(gainPerUnit(lot, toDecimal(105)).toFixed()).toBe('4.5');
        expect(gainPerUnit(lot, toDecimal(100)).toFixed()).toBe('-0.5');
    });

    it('computes the gain of a sale', () => {
        expect(totalGain(lot, toDecimal(105), toDecimal('2.5')).toFixed()).toBe('11.25');
        expect(totalGain(lot, toDecimal(105), toDecimal(10)).toFixed()).toBe('45');
    });

    it('refuses to sell more than the lot holds', () => {
        expect(() => totalGain(lot, toDecimal(105), toDecimal(11))).toThrow('Cannot sell 11 of lot A#1 holding 10');
        expect(() => totalGain(lot, toDecimal(105), toDecimal(-1))).toThrow();
    });
});
