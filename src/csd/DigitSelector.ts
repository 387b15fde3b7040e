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

import type { CsdDigit } from "./CsdString.js";

// Residuals at or below this are treated as fully encoded
export const NEGLIGIBLE_RESIDUAL = 1e-100;

/**
 * Exponent of the most significant CSD digit of a value, or -1 if there is no integral digit.
 * The weight 2^(exp + 1) is the smallest power of two above 1.5 * |value|, but at least 1.
 * Values between 2/3 and 1 therefore start with an integral digit, e.g. 0.75 is "+.0-".
 */
export function leadingExponent(value: number): number {
    const abs = Math.abs(value);
    let rem = ceilLog2(abs * 1.5);
    // 1.5 * abs may have rounded down onto 2^rem
    if (exceeds(abs, 2 ** rem)) {
        rem++;
    }
    return Math.max(rem, 0) - 1;
}

/**
 * Exact test for 1.5 * r > w with r, w >= 0.
 * The product is only inexact where it rounds onto w itself; then r is close to 2w / 3,
 * so w - r has no rounding error and r / 2 > w - r decides exactly.
 */
export function exceeds(r: number, w: number): boolean {
    const det = 1.5 * r;
    if (det != w) {
        return det > w;
    }
    return r / 2 > w - r;
}

/**
 * Smallest k with 2^k >= x.
 * Math.log2 can round onto a power of two for arguments just above or below it,
 * so the estimate is corrected by comparing against the exact power.
 */
export function ceilLog2(x: number): number {
    if (!(x > 0)) {
        throw Error(`No binary exponent for ${x}`);
    }

    let k = Math.ceil(Math.log2(x));
    while (2 ** k < x) {
        k++;
    }
    while (2 ** (k - 1) >= x) {
        k--;
    }
    return k;
}

/**
 * Picks CSD digits from the most significant position downwards.
 * A digit is non-zero when 1.5 times the residual exceeds the weight of the current position,
 * which keeps the residual within the weight and never puts two non-zero digits side by side.
 * Once the non-zero budget is used up, every further digit is 0.
 */
export class DigitSelector {
    private residual: number;
    private weight: number;
    private budget: number;

    public constructor(value: number, exponent: number, budget = Infinity) {
        this.residual = value;
        this.weight = 2 ** exponent;
        this.budget = budget;
    }

    public next(): CsdDigit {
        let digit: CsdDigit = "0";

        if (this.budget > 0) {
            if (exceeds(this.residual, this.weight)) {
                digit = "+";
                this.residual -= this.weight;
                this.budget--;
            } else if (exceeds(-this.residual, this.weight)) {
                digit = "-";
                this.residual += this.weight;
                this.budget--;
            }
        }

        this.weight /= 2;
        return digit;
    }

    public hasBudget(): boolean {
        return this.budget > 0;
    }

    public isSettled(): boolean {
        return Math.abs(this.residual) <= NEGLIGIBLE_RESIDUAL;
    }
}

/**
 * Integer-exact digit selection: compares 3 * value against the doubled weight
 * instead of scaling by 1.5, so no rounding is involved.
 */
export function selectIntegerDigits(value: number, budget = Infinity): string {
    // 1.5 * |value| is exact since 3 * value is a safe integer
    let p2n = 2 ** ceilLog2(Math.abs(value) * 1.5);
    let residual = value;
    let remaining = budget;
    let csd = "";

    while (p2n > 1) {
        const half = p2n / 2;
        const det = 3 * residual;
        if (remaining > 0 && det > p2n) {
            csd += "+";
            residual -= half;
            remaining--;
        } else if (remaining > 0 && det < -p2n) {
            csd += "-";
            residual += half;
            remaining--;
        } else {
            csd += "0";
        }
        p2n = half;
    }

    return csd;
}
