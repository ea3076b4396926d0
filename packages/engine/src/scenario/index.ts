export {
  ScenarioEvaluator,
  reduceVerdict,
  type ScenarioCriteria,
  type ScenarioReport,
  type Verdict,
} from "./scenario-evaluator.js";
export {
  createScenario,
  loadScenario,
  loadScenarioFile,
  parseScenario,
  parseScenarioYaml,
  type Scenario,
  type ScenarioOptions,
} from "./scenario-loader.js";
