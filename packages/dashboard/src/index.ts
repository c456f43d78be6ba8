export { renderDashboard, DEFAULT_DASHBOARD_TITLE } from "./render";
export type { DashboardModel } from "./render";
export { writeDashboard } from "./write";
export { escapeHtml, MISSING_MARK, renderRichText } from "./html";
