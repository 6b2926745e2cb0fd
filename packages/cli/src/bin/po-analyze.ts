import { hideBin } from 'yargs/helpers';
import { runAnalyzeTool } from '../analyze-tool.js';

process.exitCode = runAnalyzeTool(hideBin(process.argv));
