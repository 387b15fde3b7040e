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

export type CsdErrorKind = "InvalidArgument";

export class CsdError extends Error {
    public kind: CsdErrorKind;
    public position?: number;

    public constructor(msg: string, kind: CsdErrorKind = "InvalidArgument", position?: number) {
        super(msg);
        this.name = CsdError.name;

        this.kind = kind;
        this.position = position;
    }
}

export function formatCsdError(error: CsdError) {
    if (error.position !== undefined) {
        return `${error.kind}: ${error.message} at ${error.position}`;
    }
    return `${error.kind}: ${error.message}`;
}

export function checkCount(name: string, n: number) {
    if (!Number.isInteger(n) || n < 0) {
        throw new CsdError(`${name} must be a non-negative integer, got ${n}`);
    }
}

export function checkFinite(name: string, x: number) {
    if (!Number.isFinite(x)) {
        throw new CsdError(`${name} must be finite, got ${x}`);
    }
}

export function checkInteger(value: number) {
    // 3 * value must stay exact for the integer digit selection
    if (!Number.isSafeInteger(value) || !Number.isSafeInteger(3 * value)) {
        throw new CsdError(`value must be an integer in the safe range, got ${value}`);
    }
}

export function checkMagnitude(value: number) {
    if (!Number.isFinite(1.5 * value)) {
        throw new CsdError(`value ${value} is too large to encode`);
    }
}
