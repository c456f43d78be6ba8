import fs from "node:fs";
import path from "node:path";

import { renderDashboard, type DashboardModel } from "./render";

/**
 * Renders and writes the dashboard, creating parent directories. Returns the
 * absolute path written.
 */
export const writeDashboard = (model: DashboardModel, outputPath: string): string => {
	const target = path.resolve(outputPath);
	fs.mkdirSync(path.dirname(target), { recursive: true });
	fs.writeFileSync(target, renderDashboard(model), "utf-8");
	return target;
};
