import { bootstrap } from "./main";

bootstrap(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Failed to run scan:", error);
    process.exitCode = 1;
  },
);
