export interface Distribution {
  mean: number
  median: number
  min: number
  max: number
}

/**
 * Calculate median of an array of numbers
 */
export function calculateMedian(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('Cannot calculate median of empty array')
  }

  const sorted = [...values].sort((a, b) => a - b)
  const middle = Math.floor(sorted.length / 2)

  if (sorted.length % 2 === 0) {
    // Even number of values - return average of two middle values
    const left = sorted[middle - 1]
    const right = sorted[middle]
    if (left === undefined || right === undefined) {
      throw new Error('Invalid array indices')
    }
    return (left + right) / 2
  }

  const value = sorted[middle]
  if (value === undefined) {
    throw new Error('Invalid array index')
  }
  return value
}

export function summarize(values: readonly number[]): Distribution | undefined {
  if (values.length === 0) {
    return undefined
  }

  const total = values.reduce((sum, value) => sum + value, 0)
  return {
    mean: total / values.length,
    median: calculateMedian(values),
    min: Math.min(...values),
    max: Math.max(...values),
  }
}
