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

import { checkCount, CsdError } from "../utils/CsdError.js";
import { toTerms } from "../csd/CsdString.js";
import { decodeInt } from "../csd/Decoder.js";
import { MultiplierWriter } from "./MultiplierWriter.js";

const MultiplierDigits = /^[-+0]*$/;

/**
 * Generate a Verilog module that multiplies a signed input by the constant given as CSD.
 * Every non-zero digit becomes one shifted copy of the input that is added or subtracted.
 * @param csd CSD digits without separator, most significant first, e.g. "+00-00+"
 * @param n input width in bits
 * @param m power of the most significant digit, must be csd.length - 1
 * @returns Verilog source of module csd_multiplier
 */
export function generateCsdMultiplier(csd: string, n: number, m: number): string {
    checkCount("m", m);
    if (!Number.isInteger(n) || n < 1) {
        throw new CsdError(`Input width must be a positive integer, got ${n}`);
    }
    if (csd.length != m + 1) {
        throw new CsdError(`CSD length ${csd.length} doesn't match M=${m} (should be M+1)`);
    }
    if (!csd.match(MultiplierDigits)) {
        throw new CsdError("CSD string can only contain '+', '-', or '0'");
    }

    const terms = toTerms(csd, m);
    const powers = [...new Set(terms.map(t => t.power))].sort((a, b) => b - a);

    const writer = new MultiplierWriter(n, m);
    writer.writeHeader(csd, decodeInt(csd, { strict: true }));
    writer.writeShifts(powers);
    writer.writeSum(terms);
    return writer.finish();
}
