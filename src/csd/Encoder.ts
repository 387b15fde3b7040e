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
 * Convert a number to CSD with a fixed number of fractional digits.
 * Values up to 2/3 in magnitude get a single "0" as integral part.
 * @param value finite number to convert
 * @param places number of digits after the separator
 * @returns CSD string, e.g. "+00-00.+0" for (28.5, 2)
 */
export function encode(value: number, places: number): CsdString {
    checkFinite("value", value);
    checkCount("places", places);
    checkMagnitude(value);

    if (value == 0) {
        return "0" + SEPARATOR + "0".repeat(places);
    }

    const exp = leadingExponent(value);
    const selector = new DigitSelector(value, exp);

    let csd = exp < 0 ? "0" : "";
    for (let i = exp; i >= 0; i--) {
        csd += selector.next();
    }
    csd += SEPARATOR;
    for (let i = 0; i < places; i++) {
        csd += selector.next();
    }
    return csd;
}

/**
 * Convert an integer to CSD, without separator.
 * @param value safe integer
 * @returns CSD string, e.g. "+00-00" for 28
 */
export function encodeInt(value: number): CsdString {
    checkInteger(value);

    if (value == 0) {
        return "0";
    }

    return selectIntegerDigits(value);
}
