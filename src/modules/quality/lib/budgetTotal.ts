import { formatUsd } from "../../../lib/text";
import type { GrantSection } from "../../proposals/types";
import type { CheckResult } from "./types";

const AMOUNT = String.raw`\$\s?(\d{1,3}(?:,\d{3})+|\d+)(\.\d{1,2})?`;
const DOLLAR_RE = new RegExp(AMOUNT, "g");
const GRAND_TOTAL_RE = new RegExp(String.raw`grand\s+total[^$\n]{0,40}?` + AMOUNT, "gi");
const TOTAL_RE = new RegExp(String.raw`\b(?:total|sum)\b[^$\n]{0,40}?` + AMOUNT, "gi");

function toCents(whole: string, fraction: string | undefined): number {
  const dollars = Number(whole.replace(/,/g, ""));
  const cents = fraction ? Math.round(Number(fraction) * 100) : 0;
  return dollars * 100 + cents;
}

/**
 * The stated total: the last "grand total" amount, else the last amount
 * following "total" or "sum" on the same line. Null when none is stated.
 */
export function extractBudgetTotal(text: string): number | null {
  for (const re of [GRAND_TOTAL_RE, TOTAL_RE]) {
    const matches = [...text.matchAll(re)];
    const last = matches[matches.length - 1];
    if (last) return toCents(last[1], last[2]) / 100;
  }
  return null;
}

/** Passes only when the stated total equals the award exactly, to the cent. */
export function checkBudgetTotal(
  section: GrantSection,
  fundingAmount: number
): CheckResult<"budget"> {
  const text = section.content;
  const amountsFound = [...text.matchAll(DOLLAR_RE)].length;
  const actual = extractBudgetTotal(text);
  const target = fundingAmount;

  if (actual === null) {
    return {
      kind: "budget",
      subject: "Budget Total",
      status: "fail",
      reason: "no total found",
      summary: `Budget total: not found (${amountsFound} dollar amounts, target ${formatUsd(target)})`,
      details: { target, actual, difference: null, amountsFound },
      suggestions: [
        `Budget: add an explicit "Total: ${formatUsd(target)}" line and make the line items sum to it`,
      ],
    };
  }

  const difference = (Math.round(actual * 100) - Math.round(target * 100)) / 100;
  if (difference !== 0) {
    const direction = difference > 0 ? "over" : "under";
    return {
      kind: "budget",
      subject: "Budget Total",
      status: "fail",
      reason: `total ${direction} by ${formatUsd(Math.abs(difference))}`,
      summary: `Budget total: ${formatUsd(actual)} vs ${formatUsd(target)} (${difference > 0 ? "+" : "-"}${formatUsd(Math.abs(difference))})`,
      details: { target, actual, difference, amountsFound },
      suggestions: [
        `Budget: total ${formatUsd(actual)} is ${formatUsd(Math.abs(difference))} ${direction} the ${formatUsd(target)} award; adjust line items`,
      ],
    };
  }

  return {
    kind: "budget",
    subject: "Budget Total",
    status: "pass",
    summary: `Budget total: ${formatUsd(actual)} matches ${formatUsd(target)}`,
    details: { target, actual, difference, amountsFound },
    suggestions: [],
  };
}
