import { encodeNnz, encodeNnzInt } from "../../src/csd/BudgetEncoder.js";
import { CsdError } from "../../src/utils/CsdError.js";

describe("GIVEN a decimal number and a non-zero digit budget", () => {
    const expectations: [number, number, string][] = [
        // Value    NNZ     CSD
        [28.5,      4,      "+00-00.+"],
        [-0.5,      4,      "0.-"],
        [0.5,       4,      "0.+"],
        [0,         4,      "0"],
        [28,        4,      "+00-00"],
        [28.5,      1,      "+00000"],
        [5,         0,      "000"],
        [0.1,       2,      "0.00+0-"],
    ];

    for (const [value, nnz, csd] of expectations) {
        describe(`WHEN encoding ${value} with at most ${nnz} non-zero digits`, () => {
            test(`THEN it should yield '${csd}'`, () => {
                expect(encodeNnz(value, nnz)).toEqual(csd);
            });
        });
    }

    describe("WHEN the budget is negative", () => {
        test("THEN encoding should fail", () => {
            expect(() => encodeNnz(28.5, -1)).toThrow("nnz must be a non-negative integer, got -1");
        });
    });

    describe("WHEN the value is not finite", () => {
        test("THEN encoding should fail", () => {
            expect(() => encodeNnz(Infinity, 4)).toThrow(CsdError);
        });
    });
});

describe("GIVEN an integer and a non-zero digit budget", () => {
    const expectations: [number, number, string][] = [
        [37,    2,  "+00+00"],
        [158,   2,  "+0+00000"],
        [28,    4,  "+00-00"],
        [37,    10, "+00+0+"],
        [37,    0,  "000000"],
        [0,     4,  "0"],
    ];

    for (const [value, nnz, csd] of expectations) {
        describe(`WHEN encoding ${value} with at most ${nnz} non-zero digits`, () => {
            test(`THEN it should yield '${csd}'`, () => {
                expect(encodeNnzInt(value, nnz)).toEqual(csd);
            });
        });
    }

    describe("WHEN the budget is not an integer", () => {
        test("THEN encoding should fail", () => {
            expect(() => encodeNnzInt(37, 0.5)).toThrow(CsdError);
        });
    });
});
