import { parseArgs } from 'node:util'
import { CostConfigSchema } from './config.js'
import { CostInputInvalidError } from './errors.js'
import type { CostInput } from './pipeline/costEstimator.js'

// Constants

export const USAGE = `Usage: estimate --n <items> --p <selected fraction 0-1> [options]

Options:
  --input-price <usd>   USD per input token
  --output-price <usd>  USD per output token
  --in-cls <n>          average input tokens per classification
  --out-cls <n>         average output tokens per classification
  --in-blog <n>         average input tokens per blog article
  --out-blog <n>        average output tokens per blog article
  --in-social <n>       average input tokens per social-post request
  --out-social <n>      average output tokens per social-post request`

const NUMBER_FLAGS = [
  'n',
  'p',
  'input-price',
  'output-price',
  'in-cls',
  'out-cls',
  'in-blog',
  'out-blog',
  'in-social',
  'out-social'
] as const

type NumberFlag = (typeof NUMBER_FLAGS)[number]

// Helpers

function toNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined

  const number = Number(value)

  if (value.trim() === '' || Number.isNaN(number)) {
    throw new CostInputInvalidError(`--${flag} must be a number, got "${value}"`)
  }

  return number
}

export function buildCostInput(argv: string[]): CostInput {
  const { values } = parseArgs({
    args: argv,
    options: Object.fromEntries(NUMBER_FLAGS.map(flag => [flag, { type: 'string' as const }])),
    strict: true
  })

  const flag = (name: NumberFlag): number | undefined => {
    const value = values[name]

    return toNumber(typeof value === 'string' ? value : undefined, name)
  }

  const itemCount = flag('n')
  const selectedFraction = flag('p')

  if (itemCount === undefined || selectedFraction === undefined) {
    throw new CostInputInvalidError('--n and --p are required')
  }

  const defaults = CostConfigSchema.parse(undefined)

  return {
    itemCount,
    selectedFraction,
    prices: {
      input: flag('input-price') ?? defaults.prices.input,
      output: flag('output-price') ?? defaults.prices.output
    },
    averages: {
      classification: {
        input: flag('in-cls') ?? defaults.averages.classification.input,
        output: flag('out-cls') ?? defaults.averages.classification.output
      },
      blog: {
        input: flag('in-blog') ?? defaults.averages.blog.input,
        output: flag('out-blog') ?? defaults.averages.blog.output
      },
      social: {
        input: flag('in-social') ?? defaults.averages.social.input,
        output: flag('out-social') ?? defaults.averages.social.output
      }
    }
  }
}
