/**
 * Default implementations of the text services the license mapper consumes:
 * HTML-to-text conversion, HTML entity unescaping and license text
 * equivalence. Callers may inject their own through LicenseTextServices.
 */

import { convert } from "html-to-text";
import { decode } from "he";
import { getMapperConfig } from "../stores/mapperConfigStore";

export interface LicenseTextServices {
  htmlToPlainText: (html: string) => string;
  unescapeHtmlEntities: (text: string) => string;
  isLicenseTextEquivalent: (a: string | null, b: string | null) => boolean;
}

export function htmlToPlainText(html: string): string {
  const { htmlWordwrap, htmlPreserveNewlines } = getMapperConfig();
  return convert(html, {
    wordwrap: htmlWordwrap,
    preserveNewlines: htmlPreserveNewlines,
  });
}

export function unescapeHtmlEntities(text: string): string {
  return decode(text);
}

// Spellings treated as the same word when comparing license texts.
const EQUIVALENT_WORDS = new Map<string, string>([
  ["licence", "license"],
  ["licences", "licenses"],
  ["acknowledgment", "acknowledgement"],
  ["acknowledgments", "acknowledgements"],
  ["analogue", "analog"],
  ["authorisation", "authorization"],
  ["behaviour", "behavior"],
  ["centre", "center"],
  ["favour", "favor"],
  ["organisation", "organization"],
  ["per_cent", "percent"],
  ["sub_license", "sublicense"],
  ["non_commercial", "noncommercial"],
]);

const QUOTE_VARIANTS = /[‘’‚‛′`´]/g;
const DOUBLE_QUOTE_VARIANTS = /[“”„‟″]/g;
const DASH_VARIANTS = /[‐-―−]/g;

/**
 * Lower-cased word tokens with quote and dash variants folded, copyright
 * markers unified, punctuation dropped and equivalent spellings mapped.
 */
export function licenseTextTokens(text: string): string[] {
  const folded = text
    .toLowerCase()
    .replace(QUOTE_VARIANTS, "'")
    .replace(DOUBLE_QUOTE_VARIANTS, '"')
    .replace(DASH_VARIANTS, "-")
    .replace(/\bper cent\b/g, "per_cent")
    .replace(/\bsub[- ]license\b/g, "sub_license")
    .replace(/\bnon[- ]commercial\b/g, "non_commercial");
  const tokens: string[] = [];
  for (const raw of folded.split(/\s+/)) {
    if (!raw) continue;
    if (raw === "(c)" || raw === "©") {
      tokens.push("copyright");
      continue;
    }
    for (const part of raw.split(/[^\p{L}\p{N}_]+/u)) {
      if (!part) continue;
      tokens.push(EQUIVALENT_WORDS.get(part) ?? part);
    }
  }
  return tokens;
}

/** Compares token sequences; null, empty and punctuation-only texts all yield no tokens. */
export function isLicenseTextEquivalent(a: string | null, b: string | null): boolean {
  const left = a ? licenseTextTokens(a) : [];
  const right = b ? licenseTextTokens(b) : [];
  if (left.length !== right.length) return false;
  return left.every((token, i) => token === right[i]);
}

export const defaultLicenseTextServices: LicenseTextServices = {
  htmlToPlainText,
  unescapeHtmlEntities,
  isLicenseTextEquivalent,
};

export function resolveTextServices(overrides?: Partial<LicenseTextServices>): LicenseTextServices {
  return { ...defaultLicenseTextServices, ...overrides };
}
