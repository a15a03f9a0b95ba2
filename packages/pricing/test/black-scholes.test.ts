import { describe, expect, it } from "vitest";
import { createCalcGraph, formatIdentity, type CalcGraph } from "@calcgraph/engine";
import { BlackScholesNodes as N, registerBlackScholes } from "../src/black-scholes.js";
import { normalCdf } from "../src/normal.js";

const MARKET = { vol: 0.2, spot: 100, rate: 0.05 };

function atTheMoney(): CalcGraph {
  const g = createCalcGraph();
  registerBlackScholes(g, MARKET, { optionType: "call", timeToExpiry: 1, strike: 100 });
  return g;
}

describe("normalCdf", () => {
  it("matches known quantiles", () => {
    expect(normalCdf(0)).toBeCloseTo(0.5, 6);
    expect(normalCdf(1)).toBeCloseTo(0.841345, 6);
    expect(normalCdf(-1.96)).toBeCloseTo(0.024998, 5);
  });

  it("is symmetric", () => {
    for (const x of [0.1, 0.5, 1.3, 2.7]) {
      expect(normalCdf(x) + normalCdf(-x)).toBeCloseTo(1, 12);
    }
  });

  it("passes NaN through", () => {
    expect(normalCdf(Number.NaN)).toBeNaN();
  });
});

describe("registerBlackScholes", () => {
  it("prices an at-the-money call and put", () => {
    const g = atTheMoney();
    expect(g.evaluate(N.PRICE)).toBeCloseTo(10.4506, 3);

    g.setValue(N.OPTION_TYPE, "put");
    expect(g.evaluate(N.PRICE)).toBeCloseTo(5.5735, 3);
  });

  it("satisfies put-call parity", () => {
    const g = atTheMoney();
    const call = Number(g.evaluate(N.CALL));
    const put = Number(g.evaluate(N.PUT));
    const discount = Number(g.evaluate(N.DISCOUNT, 1));

    expect(discount).toBeCloseTo(Math.exp(-0.05), 12);
    expect(call - put).toBeCloseTo(100 - 100 * discount, 8);
  });

  it("leaves prices NaN until the terms are set", () => {
    const g = createCalcGraph();
    registerBlackScholes(g, MARKET);
    expect(g.evaluate(N.PRICE)).toBeNaN();

    g.setValue(N.STRIKE, 100);
    g.setValue(N.EXPIRY, 1);
    expect(g.evaluate(N.PRICE)).toBeCloseTo(10.4506, 3);
  });

  it("reprices under a volatility scenario and restores after it", () => {
    const g = atTheMoney();
    const base = Number(g.evaluate(N.PRICE));

    g.override(N.VOL, 0.4);
    const stressed = Number(g.evaluate(N.PRICE));
    expect(stressed).toBeGreaterThan(base);
    expect(stressed).toBeCloseTo(18.0230, 3);

    g.removeOverride(N.VOL);
    expect(g.evaluate(N.PRICE)).toBe(base);
  });

  it("depends only on the leg matching the option type", () => {
    const g = atTheMoney();
    g.evaluate(N.PRICE);
    expect(g.dependenciesOf(N.PRICE).map(formatIdentity)).toEqual([N.OPTION_TYPE, N.CALL]);

    g.setValue(N.OPTION_TYPE, "put");
    g.evaluate(N.PRICE);
    expect(g.dependenciesOf(N.PRICE).map(formatIdentity)).toEqual([N.OPTION_TYPE, N.PUT]);
    expect(g.dependentsOf(N.CALL)).toEqual([]);
  });

  it("shares the discount factor between the legs", () => {
    const g = atTheMoney();
    g.evaluate(N.CALL);
    g.evaluate(N.PUT);
    expect(g.dependentsOf(N.DISCOUNT, 1).map(formatIdentity)).toEqual([N.CALL, N.PUT]);
  });

  it("rejects unknown option types", () => {
    const g = atTheMoney();
    g.setValue(N.OPTION_TYPE, "straddle");
    expect(() => g.evaluate(N.PRICE)).toThrow(RangeError);
    expect(() => g.evaluate(N.PRICE)).toThrow("Unknown option type: straddle");
  });
});
