export { StatusRenderer, boardColumns, STATUS_FILE, DECISIONS_FILE } from './status_renderer';
export type { StatusRendererOptions, RenderedStatus } from './status_renderer';
export { buildStatusReport, DEFAULT_BOARD_COLUMNS } from './status_report';
export type { ApprovalLine, DecisionLine, ProjectPhase, StatusReport, TaskLine } from './status_report';
export { renderStatusMarkdown, renderDecisionsMarkdown, progressBar } from './status_markdown';
