/** A waybill is exactly 11 consecutive digits. */
export const WAYBILL_PATTERN = /^\d{11}$/;

const WAYBILL_IN_TEXT = /\b\d{11}\b/g;

export const isWaybill = (value: string) => WAYBILL_PATTERN.test(value);

export const extractWaybills = (text: string): Set<string> => {
  const found = new Set<string>();
  for (const match of text.matchAll(WAYBILL_IN_TEXT)) {
    found.add(match[0]);
  }
  return found;
};
