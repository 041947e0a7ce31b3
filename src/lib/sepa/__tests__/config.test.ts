import { describe, it, expect, beforeEach } from "vitest";
import { getSepaConfig, resetSepaConfig } from "../config";
import { InvalidArgumentError } from "../errors";

describe("getSepaConfig", () => {
  beforeEach(() => {
    resetSepaConfig();
  });

  it("falls back to defaults", () => {
    expect(getSepaConfig({})).toEqual({
      defaultCurrency: "EUR",
      dueDateFormat: "yyyy-MM-dd",
      batchBooking: null,
    });
  });

  it("reads values from the environment", () => {
    expect(
      getSepaConfig({
        SEPA_DEFAULT_CURRENCY: "CHF",
        SEPA_DUE_DATE_FORMAT: "dd.MM.yyyy",
        SEPA_BATCH_BOOKING: "true",
      })
    ).toEqual({
      defaultCurrency: "CHF",
      dueDateFormat: "dd.MM.yyyy",
      batchBooking: true,
    });
  });

  it("treats empty variables as unset", () => {
    expect(getSepaConfig({ SEPA_DEFAULT_CURRENCY: "", SEPA_BATCH_BOOKING: "" }).defaultCurrency).toBe("EUR");
  });

  it("parses batch booking false", () => {
    expect(getSepaConfig({ SEPA_BATCH_BOOKING: "false" }).batchBooking).toBe(false);
  });

  it("rejects an invalid currency code", () => {
    let caught: unknown;
    try {
      getSepaConfig({ SEPA_DEFAULT_CURRENCY: "eur" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError);
    expect(caught).toMatchObject({ field: "SEPA_DEFAULT_CURRENCY" });
  });

  it("rejects an invalid batch booking flag", () => {
    expect(() => getSepaConfig({ SEPA_BATCH_BOOKING: "yes" })).toThrow(InvalidArgumentError);
  });

  it("caches the parsed configuration until reset", () => {
    expect(getSepaConfig({ SEPA_DEFAULT_CURRENCY: "CHF" }).defaultCurrency).toBe("CHF");
    expect(getSepaConfig({}).defaultCurrency).toBe("CHF");
    resetSepaConfig();
    expect(getSepaConfig({}).defaultCurrency).toBe("EUR");
  });
  it.each(["YYYY-MM-DD", "Y-m-d"])("rejects the due date format %s", (pattern) => {
    let caught: unknown;
    try {
      getSepaConfig({ SEPA_DUE_DATE_FORMAT: pattern });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError);
    expect(caught).toMatchObject({ field: "SEPA_DUE_DATE_FORMAT" });
  });
});
