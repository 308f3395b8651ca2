export {
  runTests,
  detectFramework,
  defaultCommandFor,
  parseTestOutput,
  parsePytestOutput,
  parseJestOutput,
  parseGoTestOutput,
} from './runner.js';
export type { RunTestsOptions, TestCaseFailure, TestCounts, TestReport } from './runner.js';
