/**
 * @file State Unit Tests
 * @description Request-scoped storage keyed by type identity
 */

import { describe, it, expect } from '@jest/globals';
import { ConduitError, State, StateAbsentError, stateKey } from '../../../src/index';

class Visitor {
  constructor(public name: string) {}
}

class Animal {}
class Dog extends Animal {}

const Locale = stateKey<string>('Locale');
const Attempts = stateKey<number>('Attempts');

describe('State', () => {
  // ============================================================================
  // Class-keyed values
  // ============================================================================

  describe('Class-keyed values', () => {
    it('should store and borrow a value by its class', () => {
      const state = new State();
      state.put(new Visitor('ada'));

      expect(state.has(Visitor)).toBe(true);
      expect(state.borrow(Visitor).name).toBe('ada');
    });

    it('should replace a value of the same class', () => {
      const state = new State();
      state.put(new Visitor('ada'));
      state.put(new Visitor('grace'));

      expect(state.borrow(Visitor).name).toBe('grace');
      expect(state.size).toBe(1);
    });

    it('should hand out the stored instance for modification', () => {
      const state = new State();
      state.put(new Visitor('ada'));

      state.borrowMut(Visitor).name = 'lovelace';

      expect(state.borrow(Visitor).name).toBe('lovelace');
    });

    it('should remove a value on take', () => {
      const state = new State();
      const visitor = new Visitor('ada');
      state.put(visitor);

      expect(state.take(Visitor)).toBe(visitor);
      expect(state.has(Visitor)).toBe(false);
      expect(state.tryTake(Visitor)).toBeUndefined();
    });

    it('should key a subclass instance by the subclass only', () => {
      const state = new State();
      state.put(new Dog());

      expect(state.has(Dog)).toBe(true);
      expect(state.has(Animal)).toBe(false);
      expect(state.tryBorrow(Animal)).toBeUndefined();
    });

    it('should refuse plain objects', () => {
      const state = new State();

      expect(() => state.put({ name: 'ada' })).toThrow(ConduitError);
    });
  });

  // ============================================================================
  // Keyed values
  // ============================================================================

  describe('Keyed values', () => {
    it('should store primitives under a StateKey', () => {
      const state = new State();
      state.putAs(Locale, 'en-GB');
      state.putAs(Attempts, 3);

      expect(state.borrow(Locale)).toBe('en-GB');
      expect(state.take(Attempts)).toBe(3);
      expect(state.typeNames()).toEqual(['Locale']);
    });

    it('should distinguish keys with the same name', () => {
      const state = new State();
      const otherLocale = stateKey<string>('Locale');
      state.putAs(Locale, 'en-GB');

      expect(state.has(otherLocale)).toBe(false);
    });
  });

  // ============================================================================
  // Absence
  // ============================================================================

  describe('Absence', () => {
    it('should throw StateAbsentError naming the missing type', () => {
      const state = new State();

      expect(() => state.borrow(Visitor)).toThrow(StateAbsentError);
      expect(() => state.take(Locale)).toThrow('No value of type "Locale" is present in State');
    });

    it('should return undefined from the try variants', () => {
      const state = new State();

      expect(state.tryBorrow(Locale)).toBeUndefined();
      expect(state.tryTake(Visitor)).toBeUndefined();
    });
  });

  // ============================================================================
  // Fork
  // ============================================================================

  describe('Fork', () => {
    it('should produce an independent copy', () => {
      const state = new State();
      state.putAs(Locale, 'en-GB');
      state.put(new Visitor('ada'));

      const fork = state.fork();
      fork.take(Visitor);
      fork.putAs(Locale, 'fr-FR');

      expect(state.borrow(Visitor).name).toBe('ada');
      expect(state.borrow(Locale)).toBe('en-GB');
      expect(fork.typeNames()).toEqual(['Locale']);
    });
  });
});
