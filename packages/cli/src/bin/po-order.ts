import { runReportTool } from '../report-tool.js';

process.exitCode = runReportTool('po-order', 'order', process.argv.slice(2));
