/**
 * Response Parser
 *
 * Heuristic parsing of free-text device responses. The device documents no
 * response grammar, so every parser here degrades to "no new information"
 * instead of failing.
 */

import type { PortLayout } from './commands.js';
import type { RoutePair, RoutingTable } from './types.js';
import { PowerState } from './types.js';

// -----------------------------------------------------------------------------
// Decoding
// -----------------------------------------------------------------------------

const REPLACEMENT_CHARACTER = '\uFFFD';

/**
 * Decode raw bytes as 7-bit ASCII. Bytes above 0x7F become U+FFFD.
 */
export function decodeAscii(bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) {
    text += byte < 0x80 ? String.fromCharCode(byte) : REPLACEMENT_CHARACTER;
  }
  return text;
}

// -----------------------------------------------------------------------------
// Routing Strategies
// -----------------------------------------------------------------------------

export type StrategyResult =
  | { matched: true; pairs: RoutePair[] }
  | { matched: false };

export interface RoutingStrategy {
  name: string;
  extract: (text: string) => StrategyResult;
}

function regexStrategy(name: string, source: string): RoutingStrategy {
  return {
    name,
    extract(text: string): StrategyResult {
      const pairs: RoutePair[] = [];
      for (const match of text.matchAll(new RegExp(source, 'gi'))) {
        const [, output, input] = match;
        if (output !== undefined && input !== undefined) {
          pairs.push({ output: parseInt(output, 10), input: parseInt(input, 10) });
        }
      }
      return pairs.length > 0 ? { matched: true, pairs } : { matched: false };
    },
  };
}

/**
 * Tried in order; the first strategy that matches anything is used alone.
 */
export const ROUTING_STRATEGIES: readonly RoutingStrategy[] = [
  // O1-I2, O01:I02
  regexStrategy('short', String.raw`O(\d+)[:\-]I(\d+)`),
  // Out1:In2, Output1-Input2
  regexStrategy('long', String.raw`Out(?:put)?(\d+)[:\-]In(?:put)?(\d+)`),
  // 1:2, 01-02
  regexStrategy('bare', String.raw`(\d+)[:\-](\d+)`),
];

export interface StatusParseResult {
  /** Merged routing table; a new map, the previous one is never mutated */
  outputs: RoutingTable;
  /** Name of the strategy that matched, or null when none did */
  strategy: string | null;
  /** Pairs applied to the table */
  applied: RoutePair[];
  /** Pairs discarded for lying outside the port layout */
  rejected: RoutePair[];
}

/**
 * Merge a full routing response into the previous routing table.
 *
 * Every output in the layout gets an entry (null if never seen). Outputs the
 * response does not mention keep their previous value.
 */
export function parseStatusResponse(
  text: string,
  layout: PortLayout,
  previous: RoutingTable,
  strategies: readonly RoutingStrategy[] = ROUTING_STRATEGIES
): StatusParseResult {
  const outputs: RoutingTable = new Map(previous);

  for (let output = 1; output <= layout.numOutputs; output++) {
    if (!outputs.has(output)) {
      outputs.set(output, null);
    }
  }

  const applied: RoutePair[] = [];
  const rejected: RoutePair[] = [];

  for (const strategy of strategies) {
    const result = strategy.extract(text);
    if (!result.matched) {
      continue;
    }

    for (const pair of result.pairs) {
      const outputValid = pair.output >= 1 && pair.output <= layout.numOutputs;
      const inputValid = pair.input >= 0 && pair.input <= layout.numInputs;

      if (outputValid && inputValid) {
        outputs.set(pair.output, pair.input > 0 ? pair.input : null);
        applied.push(pair);
      } else {
        rejected.push(pair);
      }
    }

    return { outputs, strategy: strategy.name, applied, rejected };
  }

  return { outputs, strategy: null, applied, rejected };
}

// -----------------------------------------------------------------------------
// Single Output
// -----------------------------------------------------------------------------

export interface OutputParseResult {
  input: number | null;
  /** Where the value came from: an input token, an off marker, or the cache */
  source: 'input' | 'off' | 'cached';
}

// Only the leading letter may be upper case: IN03 is not an input token
const INPUT_TOKEN = /[Ii]n(?:put)?[:\s]*(\d+)/;
const OFF_MARKERS = ['closed', 'off'];

export function parseOutputResponse(
  text: string,
  layout: PortLayout,
  cached: number | null
): OutputParseResult {
  const match = INPUT_TOKEN.exec(text);
  if (match?.[1] !== undefined) {
    const input = parseInt(match[1], 10);
    if (input >= 1 && input <= layout.numInputs) {
      return { input, source: 'input' };
    }
  }

  const lower = text.toLowerCase();
  if (OFF_MARKERS.some((marker) => lower.includes(marker))) {
    return { input: null, source: 'off' };
  }

  return { input: cached, source: 'cached' };
}

// -----------------------------------------------------------------------------
// Power & Lock
// -----------------------------------------------------------------------------

export function parsePowerResponse(text: string): PowerState {
  const upper = text.toUpperCase();

  if (upper.includes('STANDBY')) {
    return PowerState.STANDBY;
  }
  if (upper.includes('PWOFF')) {
    return PowerState.OFF;
  }
  return PowerState.ON;
}

/**
 * Any reply mentioning "locked", in any case, means locked. Unlock replies
 * must therefore avoid the word.
 */
export function parseLockResponse(text: string): boolean {
  return text.toLowerCase().includes('locked');
}
