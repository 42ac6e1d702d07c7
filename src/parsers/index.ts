export { parseBenchmarkOutput, detectToolError, toMilliseconds } from './benchmark-parser'
