/*
 *   csdigit - Canonical Signed Digit conversion
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

// Digit alphabet of a CSD string, most significant digit first
export type CsdDigit = "+" | "-" | "0";

// A CSD string: digits with at most one SEPARATOR between integral and fractional part,
// e.g. "+00-00.+0" for 28.5
export type CsdString = string;

export const SEPARATOR = ".";

export interface CsdTerm {
    power: number;
    op: "+" | "-";
}

const CanonicalFormat = /^[-+0]*(?:\.[-+0]*)?$/;

export function digitValue(chr: string): -1 | 0 | 1 | undefined {
    switch (chr) {
        case "+":   return 1;
        case "-":   return -1;
        case "0":   return 0;
        default:    return undefined;
    }
}

export function isNonZero(chr: string): boolean {
    return chr == "+" || chr == "-";
}

export function countNonZero(csd: CsdString): number {
    let count = 0;
    for (const chr of csd) {
        if (isNonZero(chr)) {
            count++;
        }
    }
    return count;
}

/**
 * Check that a string is well-formed CSD: only digits and a single separator,
 * and no two non-zero digits next to each other.
 * The separator does not break adjacency, so "+.+" is not canonical.
 */
export function isCanonical(csd: string): boolean {
    if (!csd.match(CanonicalFormat)) {
        return false;
    }

    const digits = csd.replace(SEPARATOR, "");
    for (let i = 1; i < digits.length; i++) {
        if (isNonZero(digits[i - 1]) && isNonZero(digits[i])) {
            return false;
        }
    }
    return true;
}

export function negate(csd: CsdString): CsdString {
    return csd.replace(/[-+]/g, d => d == "+" ? "-" : "+");
}

// m is the power of the leftmost digit
export function toTerms(csd: CsdString, m: number): CsdTerm[] {
    const terms: CsdTerm[] = [];
    for (let i = 0; i < csd.length; i++) {
        const chr = csd[i];
        if (chr == "+" || chr == "-") {
            terms.push({ power: m - i, op: chr });
        }
    }
    return terms;
}
