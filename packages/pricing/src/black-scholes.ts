/**
 * Black-Scholes pricing of a European option, as a set of calcgraph nodes.
 *
 * Market data enters as constants (overridable for scenarios), the contract
 * terms as variables. `option price` reads only the leg that matches the
 * current option type, so switching the type moves its dependency edge.
 *
 *   spot price ──┐
 *   strike price ├─► d1 ─► d2 ─┬─► call price ─┐
 *   vol, rate, T ┘             └─► put price  ─┴─► option price ◄─ option type
 */

import {
  CalculatedNode,
  ConstantNode,
  VariableNode,
  type CalcGraph,
  type EvaluationContext,
} from "@calcgraph/engine";
import { normalCdf } from "./normal.js";

// =============================================================================
// Node names
// =============================================================================

export const BlackScholesNodes = {
  VOL: "vol",
  SPOT: "spot price",
  RATE: "risk free rate",
  OPTION_TYPE: "option type",
  EXPIRY: "time to expiry",
  STRIKE: "strike price",
  D1: "d1",
  D2: "d2",
  DISCOUNT: "discount factor",
  CALL: "call price",
  PUT: "put price",
  PRICE: "option price",
} as const;

export type OptionType = "call" | "put";

/** Externally determined inputs. */
export interface MarketData {
  /** Annualized volatility of the spot price (log-normal). */
  readonly vol: number;
  readonly spot: number;
  /** Continuously compounded, per year. */
  readonly rate: number;
}

export interface ContractTerms {
  readonly optionType?: OptionType;
  /** Years. */
  readonly timeToExpiry?: number;
  readonly strike?: number;
}

// =============================================================================
// Helpers
// =============================================================================

function readNumber(ctx: EvaluationContext, name: string, ...args: number[]): number {
  const value = ctx.evaluate(name, ...args);
  if (typeof value !== "number") {
    throw new TypeError(`"${name}" must be a number, got ${typeof value}`);
  }
  return value;
}

interface Inputs {
  readonly spot: number;
  readonly strike: number;
  readonly expiry: number;
  readonly vol: number;
  readonly rate: number;
}

function readInputs(ctx: EvaluationContext): Inputs {
  return {
    spot: readNumber(ctx, BlackScholesNodes.SPOT),
    strike: readNumber(ctx, BlackScholesNodes.STRIKE),
    expiry: readNumber(ctx, BlackScholesNodes.EXPIRY),
    vol: readNumber(ctx, BlackScholesNodes.VOL),
    rate: readNumber(ctx, BlackScholesNodes.RATE),
  };
}

// =============================================================================
// Registration
// =============================================================================

/**
 * Register the Black-Scholes nodes on `graph`. Strike and expiry stay NaN
 * (and so do the prices) until set.
 */
export function registerBlackScholes(graph: CalcGraph, market: MarketData, terms: ContractTerms = {}): void {
  const N = BlackScholesNodes;

  graph.register(new ConstantNode(N.VOL, market.vol));
  graph.register(new ConstantNode(N.SPOT, market.spot));
  graph.register(new ConstantNode(N.RATE, market.rate));

  graph.register(new VariableNode<string>(N.OPTION_TYPE, terms.optionType ?? "call"));
  graph.register(new VariableNode(N.EXPIRY, terms.timeToExpiry ?? Number.NaN));
  graph.register(new VariableNode(N.STRIKE, terms.strike ?? Number.NaN));

  graph.register(new CalculatedNode(N.D1, (ctx) => {
    const { spot, strike, expiry, vol, rate } = readInputs(ctx);
    return (Math.log(spot / strike) + (rate + (vol * vol) / 2) * expiry) / (vol * Math.sqrt(expiry));
  }));

  graph.register(new CalculatedNode(N.D2, (ctx) =>
    readNumber(ctx, N.D1) - readNumber(ctx, N.VOL) * Math.sqrt(readNumber(ctx, N.EXPIRY)),
  ));

  graph.register(new CalculatedNode(N.DISCOUNT, (ctx, years) => {
    if (typeof years !== "number") {
      throw new TypeError(`"${N.DISCOUNT}" takes a number of years, got ${typeof years}`);
    }
    return Math.exp(-readNumber(ctx, N.RATE) * years);
  }));

  graph.register(new CalculatedNode(N.CALL, (ctx) => {
    const { spot, strike, expiry } = readInputs(ctx);
    const discount = readNumber(ctx, N.DISCOUNT, expiry);
    return normalCdf(readNumber(ctx, N.D1)) * spot - normalCdf(readNumber(ctx, N.D2)) * strike * discount;
  }));

  graph.register(new CalculatedNode(N.PUT, (ctx) => {
    const { spot, strike, expiry } = readInputs(ctx);
    const discount = readNumber(ctx, N.DISCOUNT, expiry);
    return normalCdf(-readNumber(ctx, N.D2)) * strike * discount - normalCdf(-readNumber(ctx, N.D1)) * spot;
  }));

  graph.register(new CalculatedNode(N.PRICE, (ctx) => {
    const type = ctx.evaluate(N.OPTION_TYPE);
    switch (type) {
      case "call":
        return readNumber(ctx, N.CALL);
      case "put":
        return readNumber(ctx, N.PUT);
      default:
        throw new RangeError(`Unknown option type: ${String(type)}`);
    }
  }));
}
