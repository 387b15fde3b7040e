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

/**
 * Find the longest substring that occurs at least twice without the occurrences overlapping.
 *
 * table[i][j] holds the length of the common run ending at positions i - 1 and j - 1, i < j.
 * A run is only extended while it is shorter than j - i, so the two copies never overlap.
 * If several repeats share the maximum length, the first one to reach it in row order wins,
 * i.e. the one whose first copy ends earliest.
 * Positions are code points, so a repeat never splits a surrogate pair.
 * @param s input, typically a CSD string
 * @returns the repeated substring, or "" if there is none
 */
export function longestRepeatedSubstring(s: string): string {
    const chars = Array.from(s);
    const n = chars.length;
    if (n < 2) {
        return "";
    }

    const dim = n + 1;
    const table = new Uint32Array(dim * dim);

    let resLength = 0;
    let index = 0;
    for (let i = 1; i <= n; i++) {
        for (let j = i + 1; j <= n; j++) {
            const prev = table[(i - 1) * dim + (j - 1)];
            if (chars[i - 1] == chars[j - 1] && prev < j - i) {
                const len = prev + 1;
                table[i * dim + j] = len;
                if (len > resLength) {
                    resLength = len;
                    index = Math.max(i, index);
                }
            }
        }
    }

    return chars.slice(index - resLength, index).join("");
}
