import pLimit from 'p-limit'

// Types

export interface RunBatchOptions<T, R> {
  worker: (input: T, index: number) => Promise<R>
  // Maps a thrown error to a per-input result so one failure never rejects the batch.
  onError: (error: unknown, input: T, index: number) => R
  // Called in input order, each result as soon as it and every result before it have completed.
  onResult?: (result: R, index: number) => void | Promise<void>
}

// Main Function

export function createBatchProcessor(concurrentLimit: number) {
  const limit = pLimit(concurrentLimit)

  return {
    async run<T, R>(inputs: readonly T[], options: RunBatchOptions<T, R>): Promise<R[]> {
      const promises = inputs.map((input, index) =>
        limit(async () => {
          try {
            return await options.worker(input, index)
          } catch (error) {
            return options.onError(error, input, index)
          }
        })
      )

      const results: R[] = []

      // Flush from the head so output order matches input order regardless of completion order.
      for (let index = 0; index < promises.length; index++) {
        const result = await promises[index]

        await options.onResult?.(result, index)

        results.push(result)
      }

      return results
    }
  }
}
