const UNITS: [factor: number, singular: string, plural: string][] = [
  [1024 ** 5, " PB", " PB"],
  [1024 ** 4, " TB", " TB"],
  [1024 ** 3, " GB", " GB"],
  [1024 ** 2, " MB", " MB"],
  [1024, " KB", " KB"],
  [1, " byte", " bytes"],
];

/** Largest unit that fits, amount rounded down: 1536 -> "1 KB", 1 -> "1 byte". */
export function prettySize(bytes: number) {
  const unit = UNITS.find(([factor]) => bytes >= factor) ?? UNITS[UNITS.length - 1];
  const [factor, singular, plural] = unit;
  const amount = Math.floor(bytes / factor);
  return `${amount}${amount === 1 ? singular : plural}`;
}
