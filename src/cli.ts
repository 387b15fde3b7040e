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

import { command, flag, option, positional, string, subcommands, type Type } from "cmd-ts";
import { countNonZero } from "./csd/CsdString.js";
import { encodeNnz } from "./csd/BudgetEncoder.js";
import { decode } from "./csd/Decoder.js";
import { encode } from "./csd/Encoder.js";
import { generateCsdMultiplier } from "./multiplier/MultiplierGenerator.js";
import { longestRepeatedSubstring } from "./pattern/RepeatedSubstring.js";
import { CsdError, formatCsdError } from "./utils/CsdError.js";
import { parseCount, parseDecimal } from "./utils/Numbers.js";

const decimal: Type<string, number> = {
    displayName: "decimal",
    description: "decimal number, e.g. 28.5 or 1.5e-3",
    async from(str) {
        return parseDecimal(str);
    },
};

const count: Type<string, number> = {
    displayName: "count",
    description: "non-negative integer",
    async from(str) {
        return parseCount(str);
    },
};

const verbose = flag({
    long: "verbose",
    short: "v",
    description: "Print diagnostics to stderr",
});

const toCsd = command({
    name: "to-csd",
    description: "Convert a decimal number to CSD with a fixed number of fractional places",
    args: {
        value: positional({ type: decimal, displayName: "value", description: "Number to convert" }),
        places: option({
            long: "places",
            short: "p",
            description: "Number of fractional places",
            type: count,
            defaultValue: () => 4,
        }),
        verbose,
    },
    handler: (args) => guarded(() => {
        const csd = encode(args.value, args.places);
        console.log(csd);
        if (args.verbose) {
            console.error(`non-zero digits: ${countNonZero(csd)}`);
            console.error(`decoded: ${decode(csd)}`);
        }
    }),
});

const toCsdNnz = command({
    name: "to-csdnnz",
    description: "Convert a decimal number to CSD with a limited number of non-zero digits",
    args: {
        value: positional({ type: decimal, displayName: "value", description: "Number to convert" }),
        nnz: option({
            long: "nnz",
            short: "z",
            description: "Maximum number of non-zero digits",
            type: count,
            defaultValue: () => 4,
        }),
        verbose,
    },
    handler: (args) => guarded(() => {
        const csd = encodeNnz(args.value, args.nnz);
        console.log(csd);
        if (args.verbose) {
            const approx = decode(csd);
            console.error(`decoded: ${approx}`);
            console.error(`error: ${args.value - approx}`);
        }
    }),
});

const toDecimal = command({
    name: "to-decimal",
    description: "Convert a CSD string to a decimal number",
    args: {
        csd: positional({ type: string, displayName: "csd", description: "CSD string, e.g. +00-00.+" }),
        strict: flag({
            long: "strict",
            short: "s",
            description: "Reject characters other than +, -, 0 and a single '.'",
        }),
        verbose,
    },
    handler: (args) => guarded(() => {
        console.log(`${decode(args.csd, { strict: args.strict })}`);
        if (args.verbose) {
            console.error(`non-zero digits: ${countNonZero(args.csd)}`);
        }
    }),
});

const lcsre = command({
    name: "lcsre",
    description: "Find the longest repeated non-overlapping substring",
    args: {
        text: positional({ type: string, displayName: "text", description: "Input string, typically CSD" }),
        verbose,
    },
    handler: (args) => guarded(() => {
        const res = longestRepeatedSubstring(args.text);
        console.log(res);
        if (args.verbose) {
            console.error(`length: ${res.length}`);
        }
    }),
});

const multiplier = command({
    name: "multiplier",
    description: "Generate a Verilog constant multiplier from CSD digits",
    args: {
        csd: positional({ type: string, displayName: "csd", description: "CSD digits without separator" }),
        width: option({
            long: "width",
            short: "n",
            description: "Input width in bits",
            type: count,
            defaultValue: () => 8,
        }),
        verbose,
    },
    handler: (args) => guarded(() => {
        const verilog = generateCsdMultiplier(args.csd, args.width, args.csd.length - 1);
        console.log(verilog);
        if (args.verbose) {
            console.error(`adders: ${Math.max(countNonZero(args.csd) - 1, 0)}`);
        }
    }),
});

export const app = subcommands({
    name: "csdigit",
    description: "Canonical Signed Digit conversion",
    cmds: {
        "to-csd": toCsd,
        "to-csdnnz": toCsdNnz,
        "to-decimal": toDecimal,
        lcsre,
        multiplier,
    },
});

// report library errors and mark the process as failed
function guarded(action: () => void) {
    try {
        action();
    } catch (e) {
        if (!(e instanceof CsdError)) {
            throw e;
        }
        console.error(`csdigit: ${formatCsdError(e)}`);
        process.exitCode = 1;
    }
}
