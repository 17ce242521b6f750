import { readConfig } from "./config.js";
import { buildServer } from "./server.js";

const config = readConfig();

buildServer({ config })
  .then((app) => app.listen({ port: config.port, host: config.host }))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
