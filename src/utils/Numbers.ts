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

import { CsdError } from "./CsdError.js";

// optional sign, digits with decimal point, optional exponent
const DecimalFormat = /^[-+]?(?:\d+\.\d*|\d*\.\d+|\d+)(?:e[-+]?\d+)?$/i;
const CountFormat = /^\d+$/;

export function parseDecimal(str: string): number {
    if (!str.match(DecimalFormat)) {
        throw new CsdError(`Invalid decimal number '${str}'`);
    }
    return Number.parseFloat(str);
}

export function parseCount(str: string): number {
    if (!str.match(CountFormat)) {
        throw new CsdError(`Invalid count '${str}'`);
    }
    return Number.parseInt(str, 10);
}
