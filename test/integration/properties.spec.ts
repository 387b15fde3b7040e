import {
    countNonZero, decode, decodeInt, encode, encodeInt, encodeNnz, encodeNnzInt, isCanonical,
    longestRepeatedSubstring, negate,
} from "../../src/index.js";

const values = [0.5, 0.6, 0.75, 0.9, 1, 3.25, 28.5, 3.14159, 1000.25, 0.001, 12345.678, 65535, 1e6 + 1 / 3];
const places = [0, 1, 2, 4, 8, 16, 24];

describe("GIVEN a set of decimal values", () => {
    for (const value of [...values, ...values.map(v => -v)]) {
        describe(`WHEN encoding ${value}`, () => {
            test("THEN decoding should be within the last place", () => {
                for (const p of places) {
                    const csd = encode(value, p);
                    expect(Math.abs(decode(csd) - value)).toBeLessThanOrEqual(2 ** -p);
                }
            });

            test("THEN no two non-zero digits should be adjacent", () => {
                for (const p of places) {
                    expect(isCanonical(encode(value, p))).toBe(true);
                }
            });

            test("THEN the fractional part should have exactly the requested places", () => {
                for (const p of places) {
                    const [, fractional] = encode(value, p).split(".");
                    expect(fractional.length).toEqual(p);
                }
            });

            test("THEN the negated value should yield the negated digits", () => {
                for (const p of places) {
                    expect(encode(-value, p)).toEqual(negate(encode(value, p)));
                }
            });

            test("THEN a budget should bound the non-zero digits", () => {
                for (let nnz = 0; nnz <= 8; nnz++) {
                    const csd = encodeNnz(value, nnz);
                    expect(countNonZero(csd)).toBeLessThanOrEqual(nnz);
                    expect(isCanonical(csd)).toBe(true);
                }
            });
        });
    }
});

describe("GIVEN zero", () => {
    test("THEN it should be encoded as 0 with zero places", () => {
        expect(encode(0, 0)).toEqual("0.");
        for (let p = 1; p <= 8; p++) {
            expect(encode(0, p)).toEqual("0." + "0".repeat(p));
        }
        expect(encodeInt(0)).toEqual("0");
    });
});

describe("GIVEN a range of integers", () => {
    const ints: number[] = [];
    for (let i = -300; i <= 300; i++) {
        ints.push(i);
    }
    ints.push(2 ** 31 - 1, -(2 ** 31), 1234567, -7654321);

    test("THEN the integer encoding should decode to the same integer", () => {
        for (const i of ints) {
            expect(decodeInt(encodeInt(i))).toEqual(i);
        }
    });

    test("THEN the integer encoding should be canonical", () => {
        for (const i of ints) {
            expect(isCanonical(encodeInt(i))).toBe(true);
        }
    });

    test("THEN an unlimited budget should not change the encoding", () => {
        for (const i of ints) {
            const csd = encodeInt(i);
            expect(encodeNnzInt(i, countNonZero(csd))).toEqual(csd);
        }
    });

    test("THEN a limited budget should bound the non-zero digits", () => {
        for (const i of ints) {
            for (let nnz = 0; nnz <= 3; nnz++) {
                const csd = encodeNnzInt(i, nnz);
                expect(countNonZero(csd)).toBeLessThanOrEqual(nnz);
                expect(csd.length).toEqual(encodeInt(i).length);
            }
        }
    });
});

describe("GIVEN a string without repeated characters", () => {
    test("THEN there should be no repeated substring", () => {
        expect(longestRepeatedSubstring("+-0.")).toEqual("");
        expect(longestRepeatedSubstring("abcdefghijklmnop")).toEqual("");
    });
});

describe("GIVEN the CSD string of a value", () => {
    test("THEN a repeated pattern should occur twice without overlap", () => {
        const csd = encode(0.2, 20);
        const repeat = longestRepeatedSubstring(csd);
        expect(repeat.length).toBeGreaterThan(0);
        const first = csd.indexOf(repeat);
        expect(csd.indexOf(repeat, first + repeat.length)).toBeGreaterThan(first);
    });
});

describe("GIVEN values next to a leading exponent boundary", () => {
    // 1.5 * v lands on or right next to 2^k
    const floats: number[] = [];
    for (let k = 1; k <= 52; k++) {
        const v = 2 ** k / 1.5;
        floats.push(v, v * (1 + 2 ** -52), v * (1 - 2 ** -52), v * (1 + 2 ** -50));
    }

    // (2^(k+1) + d) / 3 for the d that makes it an integer
    const ints: number[] = [];
    for (let k = 1; k <= 51; k++) {
        for (const d of [-2, -1, 1, 2]) {
            const n = 2 ** (k + 1) + d;
            if (n % 3 == 0) {
                ints.push(n / 3, -n / 3);
            }
        }
    }

    test("THEN float encodings should be canonical and decode within the last place", () => {
        for (const v of [...floats, ...floats.map(f => -f)]) {
            const csd = encode(v, 8);
            expect(isCanonical(csd), `${v} -> ${csd}`).toBe(true);
            expect(Math.abs(decode(csd) - v)).toBeLessThanOrEqual(2 ** -8);
        }
    });

    test("THEN budgeted float encodings should be canonical", () => {
        for (const v of floats) {
            const csd = encodeNnz(v, 3);
            expect(isCanonical(csd), `${v} -> ${csd}`).toBe(true);
            expect(countNonZero(csd)).toBeLessThanOrEqual(3);
        }
    });

    test("THEN integer encodings should be canonical and decode exactly", () => {
        for (const i of ints) {
            const csd = encodeInt(i);
            expect(isCanonical(csd), `${i} -> ${csd}`).toBe(true);
            expect(decodeInt(csd)).toEqual(i);
            expect(isCanonical(encodeNnzInt(i, 2))).toBe(true);
        }
    });
});
