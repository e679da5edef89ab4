const PLACE_WORDS = [
  'Third',
  'Fourth',
  'Fifth',
  'Sixth',
  'Seventh',
  'Eighth',
  'Ninth',
  'Tenth',
  'Eleventh',
  'Twelfth',
];

/**
 * 1 → "1st", 2 → "2nd", 11 → "11th", 23 → "23rd"
 */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * Human-readable label for a final place.
 */
export function placeLabel(place: number): string {
  if (place === 1) return 'Champion';
  if (place === 2) return 'Runner Up';
  const word = PLACE_WORDS[place - 3];
  return word ? `${word} Place` : `${ordinal(place)} Place`;
}
