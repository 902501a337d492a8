export interface StagegatePaths {
  root: string;         // .stagegate/
  pipeline: string;     // .stagegate/pipeline.yaml
  stateDb: string;      // .stagegate/state.db
  env: string;          // .stagegate/env.json
  buildsDir: string;    // .stagegate/builds/
}
