import { runReportTool } from '../report-tool.js';

process.exitCode = runReportTool('po-mod-order', 'module-order', process.argv.slice(2));
