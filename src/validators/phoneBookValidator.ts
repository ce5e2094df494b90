// Accepted name shapes, e.g. "John Smith", "Smith, John", "Pat O'Neil-Smith",
// "O'Neil, Pat K.", "John K. Smith", "John K. O'Neil", "Smith, John K."
const NAME_SHAPES: RegExp[] = [
  /([A-Za-z]+\s?){1,3}/,
  /[A-Za-z]+,\s[A-Za-z]+[\sA-Za-z]*/,
  /([A-Za-z]+\s)[A-Za-z]'[A-Za-z]+(-[A-Za-z]+)?/,
  /[A-Za-z]'[A-Za-z]+,\s[A-Za-z]+\s[A-Z]\./,
  /[A-Za-z]+\s[A-Za-z]\.\s[A-Za-z]+/,
  /[A-Za-z]+\s[A-Za-z]\.\s[A-Z]'[A-Za-z]+/,
  /[A-Za-z]+,\s[A-Za-z]+\s[A-Z]\./,
];

const FULL_NAME_PATTERN = new RegExp(`^(?=.{1,35}$)(?:${NAME_SHAPES.map((shape) => shape.source).join('|')})$`);

// No run of six or more digits at the start, then an optional +country code,
// an optional area group ("1 ", "(21) " or "(703)") and three digit groups.
const PHONE_NUMBER_PATTERN = /^(?!\d{6,})\+?\d{0,3}\s?(\d\s|\(\d{2}\)\s|\(\d{3}\))?[.-]?\d{2,5}[\s.-]?\d{2,5}[\s.-]?\d{1,9}$/;

export function validateFullName(name: string): boolean {
  return FULL_NAME_PATTERN.test(name);
}

export function validatePhoneNumber(phoneNumber: string): boolean {
  return PHONE_NUMBER_PATTERN.test(phoneNumber);
}
