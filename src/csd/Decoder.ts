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

import { CsdError } from "../utils/CsdError.js";
import { digitValue, SEPARATOR } from "./CsdString.js";

export interface DecodeOptions {
    // Reject characters other than digits and a single separator instead of reading them as 0
    strict?: boolean;
}

/**
 * Convert a CSD string back to a number.
 * Without separator the whole string is the integral part.
 * In lenient mode (the default) any unknown character counts as a 0 digit
 * and keeps its position, a second separator included.
 * More than 1024 integral digits overflow to +/-Infinity, strict mode rejects that.
 * @param csd CSD string, e.g. "+00-00.+"
 * @param opts decoding options
 * @returns decoded value
 */
export function decode(csd: string, opts: DecodeOptions = {}): number {
    const loc = csd.indexOf(SEPARATOR);
    if (loc < 0) {
        return checkRange(decodeIntegral(csd, 0, opts), opts);
    }

    const integral = decodeIntegral(csd.substring(0, loc), 0, opts);
    const fractional = decodeFractional(csd.substring(loc + 1), loc + 1, opts);
    return checkRange(integral + fractional, opts);
}

/**
 * Convert a CSD string without separator to an integer.
 */
export function decodeInt(csd: string, opts: DecodeOptions = {}): number {
    const loc = csd.indexOf(SEPARATOR);
    if (loc >= 0) {
        throw new CsdError("Separator in integer CSD", "InvalidArgument", loc);
    }
    return checkRange(decodeIntegral(csd, 0, opts), opts);
}

function checkRange(value: number, opts: DecodeOptions): number {
    if (opts.strict && !Number.isFinite(value)) {
        throw new CsdError("CSD value exceeds the number range");
    }
    return value;
}

function decodeIntegral(digits: string, offset: number, opts: DecodeOptions): number {
    let total = 0;
    for (let i = 0; i < digits.length; i++) {
        total = total * 2 + readDigit(digits[i], offset + i, opts);
    }
    return total;
}

function decodeFractional(digits: string, offset: number, opts: DecodeOptions): number {
    let total = 0;
    let scale = 0.5;
    for (let i = 0; i < digits.length; i++) {
        total += readDigit(digits[i], offset + i, opts) * scale;
        scale /= 2;
    }
    return total;
}

function readDigit(chr: string, pos: number, opts: DecodeOptions): number {
    const value = digitValue(chr);
    if (value !== undefined) {
        return value;
    }

    if (opts.strict) {
        throw new CsdError(`Invalid CSD character '${chr}'`, "InvalidArgument", pos);
    }
    return 0;
}
