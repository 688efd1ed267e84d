import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
  name: "ecs-fargate-deployment-action",
  entries: ["src/index"],
  parallel: true,
  outDir: "out",
  failOnWarn: false,
  externals: [],
  rollup: {
    preserveDynamicImports: false,
    inlineDependencies: true,
    esbuild: {
      minify: false,
      target: "node20",
    },
    output: {
      sourcemap: "inline",
    },
    resolve: {
      preferBuiltins: true,
    },
  },
  sourcemap: true,
  declaration: false,
});
