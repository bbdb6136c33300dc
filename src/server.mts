import { loadConfig, loadSettings } from "./config.mts";
import { createHandler } from "./deployment.mts";
import { createApp } from "./app.mts";
import { createMailTransport } from "./notify.mts";
import { abortOnShutdown } from "./shutdown.mts";

const settings = loadSettings();
const config = loadConfig(settings.configPath);
const shutdown = new AbortController();

const handler = createHandler({
  config,
  credentials: settings.credentials,
  transport: createMailTransport(settings.smtpUrl),
  mailFrom: settings.mailFrom,
  signal: shutdown.signal,
});

const server = createApp(handler).listen(settings.port, () => {
  console.info(
    `Listening on :${settings.port} for ${Object.keys(config.repositories).length} repositories`
  );
});

abortOnShutdown(shutdown);
shutdown.signal.addEventListener("abort", () => {
  server.close((err) => {
    if (err != null) {
      console.error(`Failed to close the server: ${err.message}`);
      process.exitCode = 1;
    }
  });
});
