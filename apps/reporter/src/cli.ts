import { bootstrapEnv } from "./config.js";
import { main } from "./index.js";

bootstrapEnv();

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
