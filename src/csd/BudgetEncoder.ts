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

import { checkCount, checkFinite, checkInteger, checkMagnitude } from "../utils/CsdError.js";
import { type CsdString, SEPARATOR } from "./CsdString.js";
import { DigitSelector, leadingExponent, selectIntegerDigits } from "./DigitSelector.js";

/**
 * Convert a number to CSD using at most nnz non-zero digits.
 * Fractional digits are only produced while there is budget left and the value
 * is not yet fully represented, so the separator is omitted for exact integers.
 * @param value finite number to convert
 * @param nnz maximum number of non-zero digits
 * @returns CSD string, e.g. "+00-00.+" for (28.5, 4)
 */
export function encodeNnz(value: number, nnz: number): CsdString {
    checkFinite("value", value);
    checkCount("nnz", nnz);
    checkMagnitude(value);

    if (value == 0) {
        return "0";
    }

    let exp = leadingExponent(value);
    const selector = new DigitSelector(value, exp, nnz);

    let csd = exp < 0 ? "0" : "";
    while (exp >= 0 || (selector.hasBudget() && !selector.isSettled())) {
        if (exp == -1) {
            csd += SEPARATOR;
        }
        csd += selector.next();
        exp--;
    }
    return csd;
}

/**
 * Convert an integer to CSD using at most nnz non-zero digits.
 * The digit count is the same as for encodeInt, lower digits become 0 once the budget is spent.
 * @param value safe integer
 * @param nnz maximum number of non-zero digits
 * @returns CSD string, e.g. "+00+00" for (37, 2)
 */
export function encodeNnzInt(value: number, nnz: number): CsdString {
    checkInteger(value);
    checkCount("nnz", nnz);

    if (value == 0) {
        return "0";
    }

    return selectIntegerDigits(value, nnz);
}
