import { describe, it, expect } from 'vitest';
import { parseDuration, elapsedSeconds } from '../time-parser.js';

describe('Time Parser', () => {
  describe('parseDuration', () => {
    it('should parse milliseconds', () => {
      expect(parseDuration('400ms')).toBe(400);
    });

    it('should treat bare numbers as milliseconds', () => {
      expect(parseDuration('250')).toBe(250);
      expect(parseDuration(1500)).toBe(1500);
    });

    it('should parse seconds, including fractions', () => {
      expect(parseDuration('12s')).toBe(12000);
      expect(parseDuration('1.5s')).toBe(1500);
    });

    it('should parse minutes and hours', () => {
      expect(parseDuration('2m')).toBe(120000);
      expect(parseDuration('1h')).toBe(3600000);
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseDuration(' 5s ')).toBe(5000);
    });

    it('should throw error for invalid format', () => {
      expect(() => parseDuration('invalid')).toThrow('Invalid duration format');
      expect(() => parseDuration('s')).toThrow('Invalid duration format');
      expect(() => parseDuration('1d')).toThrow('Invalid duration format');
      expect(() => parseDuration('-1s')).toThrow('Invalid duration format');
    });

    it('should reject negative numbers', () => {
      expect(() => parseDuration(-5)).toThrow('Invalid duration: -5');
    });
  });

  describe('elapsedSeconds', () => {
    it('should convert elapsed milliseconds to seconds', () => {
      expect(elapsedSeconds(1000, 3500)).toBe(2.5);
    });
  });
});
