import "reflect-metadata";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { validate as validateConfig } from "./config.module";
import { EnvironmentVariables } from "./env.validation";

function validate(input: Record<string, unknown>) {
  const instance = plainToInstance(EnvironmentVariables, input, {
    enableImplicitConversion: true,
  });
  return validateSync(instance, { skipMissingProperties: false });
}

const VALID_BASE = {
  NODE_ENV: "test",
  ELECTION_BALANCE_ITERATIONS: "25",
  ELECTION_BALANCE_TOLERANCE: "1000",
  ELECTION_DATA_SOURCE: "json-file",
};

describe("EnvironmentVariables validation", () => {
  it("passes with all vars present", () => {
    expect(validate(VALID_BASE)).toHaveLength(0);
  });

  it("passes with an empty environment and applies defaults", () => {
    const result = validateConfig({});
    expect(result.NODE_ENV).toBe("development");
    expect(result.ELECTION_BALANCE_ITERATIONS).toBe(10);
    expect(result.ELECTION_BALANCE_TOLERANCE).toBe("0");
    expect(result.ELECTION_DATA_SOURCE).toBeUndefined();
  });

  it("converts ELECTION_BALANCE_ITERATIONS to a number", () => {
    expect(validateConfig(VALID_BASE).ELECTION_BALANCE_ITERATIONS).toBe(25);
  });

  it("accepts zero balancing iterations", () => {
    expect(validate({ ...VALID_BASE, ELECTION_BALANCE_ITERATIONS: "0" })).toHaveLength(0);
  });

  it("fails when ELECTION_BALANCE_ITERATIONS is not an integer", () => {
    const errors = validate({ ...VALID_BASE, ELECTION_BALANCE_ITERATIONS: "2.5" });
    expect(errors.some((e) => e.property === "ELECTION_BALANCE_ITERATIONS")).toBe(true);
  });

  it("fails when ELECTION_BALANCE_ITERATIONS is out of range", () => {
    const errors = validate({ ...VALID_BASE, ELECTION_BALANCE_ITERATIONS: "1001" });
    expect(errors.some((e) => e.property === "ELECTION_BALANCE_ITERATIONS")).toBe(true);
  });

  it("fails when ELECTION_BALANCE_TOLERANCE is negative", () => {
    const errors = validate({ ...VALID_BASE, ELECTION_BALANCE_TOLERANCE: "-1" });
    expect(errors.some((e) => e.property === "ELECTION_BALANCE_TOLERANCE")).toBe(true);
  });

  it("fails when ELECTION_DATA_SOURCE is empty", () => {
    const errors = validate({ ...VALID_BASE, ELECTION_DATA_SOURCE: "" });
    expect(errors.some((e) => e.property === "ELECTION_DATA_SOURCE")).toBe(true);
  });

  it("fails when NODE_ENV is an invalid value", () => {
    const errors = validate({ ...VALID_BASE, NODE_ENV: "banana" });
    expect(errors.some((e) => e.property === "NODE_ENV")).toBe(true);
  });

  it("throws a combined message from the config validate hook", () => {
    expect(() => validateConfig({ ...VALID_BASE, NODE_ENV: "banana" })).toThrow(
      /^Environment validation failed:\nNODE_ENV: /,
    );
  });
});
