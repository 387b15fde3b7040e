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

import type { CsdTerm } from "../csd/CsdString.js";

// Emits the Verilog text of a constant multiplier module, one line at a time
export class MultiplierWriter {
    private lines: string[] = [""];

    // n: input width, m: highest power of the constant
    public constructor(private n: number, private m: number) {
    }

    public writeHeader(csd: string, value: number): void {
        const n = this.n;
        this.lines.push(`// CSD Multiplier for pattern: ${csd} (value: ${value})`);
        this.lines.push("module csd_multiplier (");
        this.lines.push(`    input signed [${n - 1}:0] x,      // Input value (signed)`);
        this.lines.push(`    output signed [${this.resultMsb()}:0] result // Result (signed)`);
        this.lines.push(");");
    }

    public writeShifts(powers: number[]): void {
        if (powers.length == 0) {
            return;
        }

        this.lines.push("");
        this.lines.push("    // Signed shifted versions (Verilog handles sign extension)");
        for (const p of powers) {
            this.lines.push(`    wire signed [${this.resultMsb()}:0] x_shift${p} = ${this.extend(this.m - p)} << ${p};`);
        }
    }

    public writeSum(terms: CsdTerm[]): void {
        this.lines.push("");
        this.lines.push("    // CSD implementation with signed arithmetic");
        if (terms.length == 0) {
            this.lines.push("    assign result = 0;");
            return;
        }

        const [first, ...rest] = terms;
        let expr = `${first.op == "-" ? "-" : ""}x_shift${first.power}`;
        for (const term of rest) {
            expr += ` ${term.op} x_shift${term.power}`;
        }
        this.lines.push(`    assign result = ${expr};`);
    }

    public finish(): string {
        this.lines.push("endmodule");
        this.lines.push("");
        return this.lines.join("\n");
    }

    private resultMsb(): number {
        return this.n + this.m - 1;
    }

    // sign-extend x by the given number of bits
    private extend(bits: number): string {
        if (bits == 0) {
            return "$signed(x)";
        }
        return `$signed({ {${bits}{x[${this.n - 1}]}}, x })`;
    }
}
