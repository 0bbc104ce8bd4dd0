import { roundTo } from '../shared/utils.js'

export type Pricing = {
  /** USD per one million prompt tokens. */
  inputPerMillion: number
  /** USD per one million completion tokens. */
  outputPerMillion: number
}

const TOKENS_PER_UNIT = 1_000_000
const COST_DIGITS = 6

export const estimateCostUsd = (
  pricing: Pricing,
  usage: { inputTokens: number; outputTokens: number },
): number =>
  roundTo(
    usage.inputTokens * (pricing.inputPerMillion / TOKENS_PER_UNIT) +
      usage.outputTokens * (pricing.outputPerMillion / TOKENS_PER_UNIT),
    COST_DIGITS,
  )
