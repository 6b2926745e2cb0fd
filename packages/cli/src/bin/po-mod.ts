import { runReportTool } from '../report-tool.js';

process.exitCode = runReportTool('po-mod', 'module', process.argv.slice(2));
