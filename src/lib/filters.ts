/**
 * Keep/reject rules for detail pages: keyword checks over the lower-cased
 * page text, plus the extracted exterior color.
 */

export interface FilterInput {
  fullText: string; // lower-cased visible page text
  color: string; // raw extracted color
}

export interface FilterGate {
  name: string;
  passes(input: FilterInput): boolean;
}

export type FilterVerdict = { passed: true } | { passed: false; gate: string };

export const CHARGE_KEYWORDS = ["optimum charge", "ac22", "22kw", "22 kw"];
export const F1_BLADE_FINISHES = ["gris schiste", "gris rafale"];
export const EXCLUDED_COLOR_FRAGMENTS = ["rouge", "flamme"];
export const EXCLUDED_EXACT_COLORS = ["noir"];

export const chargeTypeGate: FilterGate = {
  name: "charge-type",
  passes: ({ fullText }) => CHARGE_KEYWORDS.some((k) => fullText.includes(k)),
};

// Bare F1 blade on schiste/rafale is rejected unless the body-colored
// ("ton caisse") option is also listed.
export const f1BladeGate: FilterGate = {
  name: "f1-blade",
  passes: ({ fullText }) => {
    if (!fullText.includes("lame f1")) return true;
    if (fullText.includes("ton caisse")) return true;
    return !F1_BLADE_FINISHES.some((finish) => fullText.includes(finish));
  },
};

export const colorGate: FilterGate = {
  name: "color",
  passes: ({ color }) => {
    const c = color.trim().toLowerCase();
    if (EXCLUDED_COLOR_FRAGMENTS.some((fragment) => c.includes(fragment))) return false;
    return !EXCLUDED_EXACT_COLORS.includes(c);
  },
};

export const FILTER_CHAIN: FilterGate[] = [chargeTypeGate, f1BladeGate, colorGate];

export function runFilterChain(input: FilterInput, gates: FilterGate[] = FILTER_CHAIN): FilterVerdict {
  for (const gate of gates) {
    if (!gate.passes(input)) return { passed: false, gate: gate.name };
  }
  return { passed: true };
}
