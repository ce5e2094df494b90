import { describe, it, expect } from 'vitest';
import { validateFullName, validatePhoneNumber } from '../src/validators/phoneBookValidator';

describe('validateFullName', () => {
  it.each([
    'Cher',
    'John Smith',
    'John Paul Smith',
    'Smith, John',
    'Smith, John Paul',
    "Pat O'Neil",
    "Pat O'Neil-Smith",
    "O'Neil, Pat K.",
    'John K. Smith',
    "John K. O'Neil",
    'Smith, John K.',
    'A'.repeat(35),
  ])('accepts %j', (name) => {
    expect(validateFullName(name)).toBe(true);
  });

  it.each([
    '',
    'A'.repeat(36),
    'Abcdefghij Abcdefghij Abcdefghijklmnop',
    'Brad Everett Samuel Smith',
    "Ron O''Henry",
    "Ron O'Henry-Smith-Barnes",
    'L33t Hacker',
    'select * from users;',
    '<Script>alert("XSS")</Script>',
  ])('rejects %j', (name) => {
    expect(validateFullName(name)).toBe(false);
  });
});

describe('validatePhoneNumber', () => {
  it.each([
    '12345',
    '123-1234',
    '+1 555-1234',
    '(703)111-2121',
    '+1(703)111-2121',
    '1(703)123-1234',
    '+32 (21) 212-2324',
    '011 701 111 1234',
    '12345.12345',
  ])('accepts %j', (phoneNumber) => {
    expect(validatePhoneNumber(phoneNumber)).toBe(true);
  });

  it.each([
    '',
    '123456',
    '7031111234',
    '123456-7890',
    '+1234 (201) 123-1234',
    '1/703/123/1234',
    'Nr 102-123-1234',
    '<script>alert("XSS")</script>',
  ])('rejects %j', (phoneNumber) => {
    expect(validatePhoneNumber(phoneNumber)).toBe(false);
  });
});
