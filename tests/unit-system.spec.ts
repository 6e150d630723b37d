import { describe, expect, it } from "vitest";
import { UnitIncompatibleError } from "../shared/gcm-errors";
import { AU } from "../shared/physics-const";
import {
  UnitSymbol,
  conversionFactor,
  parseQuantity,
  quantityValue,
  resolveUnit,
} from "../shared/unit-system";

describe("unit system: quantity parsing", () => {
  it("reads value and unit from strings, numbers and objects", () => {
    expect(parseQuantity("5800 K", "K")).toEqual({ value: 5800, unit: "K" });
    expect(parseQuantity("5800K", "K")).toEqual({ value: 5800, unit: "K" });
    expect(parseQuantity("1e-3", "")).toEqual({ value: 0.001, unit: "" });
    expect(parseQuantity(2, "bar")).toEqual({ value: 2, unit: "bar" });
    expect(parseQuantity({ value: 3, unit: "micron" }, "m")).toEqual({ value: 3, unit: "um" });
  });

  it("treats a unitless string as dimensionless", () => {
    expect(() => quantityValue("1", "bar")).toThrow(UnitIncompatibleError);
  });

  it("rejects unknown unit symbols and unparseable strings", () => {
    expect(() => resolveUnit("parsec")).toThrow(UnitIncompatibleError);
    expect(() => parseQuantity("lots of gas", "")).toThrow(UnitIncompatibleError);
    expect(UnitSymbol.safeParse("furlong").success).toBe(false);
  });
});

describe("unit system: conversion", () => {
  it("converts within a dimension", () => {
    expect(quantityValue("1 bar", "Pa")).toBe(100000);
    expect(quantityValue({ value: 1, unit: "AU" }, "m")).toBe(AU);
    expect(quantityValue("1 um", "nm")).toBeCloseTo(1000, 9);
    expect(quantityValue("1 atm", "bar")).toBeCloseTo(1.01325, 12);
    expect(quantityValue("250 cm/s", "m/s")).toBeCloseTo(2.5, 12);
    expect(quantityValue("5 %", "")).toBeCloseTo(0.05, 12);
  });

  it("fails on dimensionally incompatible units", () => {
    expect(() => quantityValue("1 um", "")).toThrow(UnitIncompatibleError);
    expect(() => conversionFactor("K", "m")).toThrow(/cannot convert "K" to "m"/);
    expect(() => quantityValue("10 m/s", "bar")).toThrow(UnitIncompatibleError);
  });
});
