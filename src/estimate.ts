#!/usr/bin/env node
import { CostInputInvalidError } from './errors.js'
import { buildCostInput, USAGE } from './estimateArgs.js'
import { formatEstimateLines } from './output/console.js'
import { estimateCost } from './pipeline/costEstimator.js'

// Main

function main(): void {
  try {
    const estimate = estimateCost(buildCostInput(process.argv.slice(2)))

    for (const line of formatEstimateLines(estimate)) {
      console.log(line)
    }
  } catch (error) {
    if (error instanceof CostInputInvalidError || (error instanceof TypeError && 'code' in error)) {
      console.error(`Error: ${error.message}\n\n${USAGE}`)

      process.exit(1)
    }

    throw error
  }
}

main()
