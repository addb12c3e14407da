import { readProcessConfig } from "../src/config/waveTiming";
import { systemClock } from "../src/engine/clock";
import { logger } from "../src/engine/logger";
import { createEventCatalogue } from "../src/data/events";
import { positionStore } from "../src/store/positionStore";
import { createApp } from "./app";

const config = readProcessConfig();
logger.setLevel(config.logLevel);

const events = createEventCatalogue({ clock: systemClock, positions: positionStore });
const app = createApp(events);

app.listen(config.port, () => {
  logger.info("server", `Diagnostics server listening on port ${config.port}`, { events: events.size });
});
