import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { createJsonCatalogStore } from "./clients/catalogStore";
import { createGoogleCalendarClient } from "./clients/googleCalendar";
import { createLogger, setLogLevel } from "./lib/logger";
import { XlsxReportExporter } from "./services/exportService";
import { createReportService } from "./services/reportService";

const config = loadConfig();
setLogLevel(config.logLevel);
const log = createLogger("server");

const exporter = new XlsxReportExporter({ dir: config.exportDir, ttlMinutes: config.exportTtlMinutes });

const reportService = createReportService({
  catalogStore: createJsonCatalogStore(config.catalogPath),
  calendar: createGoogleCalendarClient({
    baseUrl: config.calendarBaseUrl,
    accessToken: config.accessToken,
  }),
  exporter,
  exclusionMode: config.exclusionMode,
});

const app = createApp({ reportService, exports: exporter });

app.listen(config.port, () => log.info(`API listening on http://localhost:${config.port}`));
