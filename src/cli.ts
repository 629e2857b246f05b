#!/usr/bin/env node

import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import express, { type Request, type Response } from "express";
import { annotateGraphFile, loadAllowList } from './index.js';
import { featuresSummary } from './features2json.js';
import FeaturesDotFormatter from './Nas/dot/FeaturesDotFormatter.js';
import { generateGraphvizOnlineLink, renderDotToSVG } from './Nas/dot/graphviz.js';
import { type AnnotationOptions, defaultAnnotationOptions } from './AnnotationOptions.js';


function renderPage(title: string, svgContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${title}</title>
  <style>
    body { margin: 0; font-family: Arial, sans-serif; background-color: #f9f9f9; text-align: center; }
    .graph-container { max-width: 90%; margin: 0 auto; overflow: auto; background-color: #fff; }
    svg { max-width: 100%; height: auto; }
  </style>
</head>
<body>
  <h1>${title}</h1>
  <div class="graph-container">${svgContent}</div>
</body>
</html>`;
}


const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let version = 'unknown';
try {
  const packageJson: { version?: string } = JSON.parse(
    fs.readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf8')
  );
  version = packageJson.version ?? version;
} catch (error) {
  console.warn('Warning: Unable to read package.json for version info.', error);
}

const argv = await yargs(hideBin(process.argv))
  .usage('Usage: features-flow <graph.json> [options]')
  .version(version)
  .parserConfiguration({
    'short-option-groups': false,
    'camel-case-expansion': true,
    'boolean-negation': true,
    'duplicate-arguments-array': false,
  })
  .strictOptions()
  .demandCommand(1, 'You need to provide a JSON graph description')
  .option('output', {
    alias: 'o',
    describe: 'Write the result to a file',
    type: 'string',
  })
  .option('format', {
    alias: 'fm',
    describe: 'Output format (json summary or dot)',
    type: 'string',
    choices: ['json', 'dot'],
    default: 'json',
  })
  .option('verbosity', {
    alias: 'v',
    describe: 'Control verbosity (0 = silent, 1 = normal/outputs, 2 = verbose)',
    type: 'number',
    default: 1,
  })
  .option('allowList', {
    alias: 'al',
    describe: 'JSON file with extra allow-list entries',
    type: 'string',
  })
  .option('visualization', {
    alias: 'vz',
    describe: 'Choose visualization option (0 = none, 1 = Graphviz online link, 2 = Graphviz server)',
    type: 'number',
    default: 0,
  })
  .option('port', {
    alias: 'p',
    describe: 'Port of the Graphviz server',
    type: 'number',
    default: 8080,
  })
  .help()
  .argv;

const inputFilePath = argv._[0]; // Positional argument for input file

if (typeof inputFilePath !== 'string') {
  throw new Error('The input file path must be a string.');
}

const verbosity = argv.verbosity;
const dotFormatter = new FeaturesDotFormatter();

try {
  const options: AnnotationOptions = {
    ...defaultAnnotationOptions,
    allowList: loadAllowList(argv.allowList),
    verbosity,
  };

  const graph = annotateGraphFile(inputFilePath, options);
  const result = argv.format === 'dot'
    ? graph.toString(dotFormatter)
    : JSON.stringify(featuresSummary(graph), null, 2);

  if (argv.output) {
    fs.writeFileSync(argv.output, result);
    if (verbosity > 0) console.log(`Output written to ${argv.output} in ${argv.format} format`);
  } else if (verbosity > 0) {
    console.log(result);
  }

  if (argv.visualization === 1) {
    console.log('Graphviz Online Link:', generateGraphvizOnlineLink(graph.toString(dotFormatter)));
  } else if (argv.visualization === 2) {
    const app = express();
    const port = argv.port;

    app.get("/", async (req: Request, res: Response) => {
      try {
        const svgContent = await renderDotToSVG(graph.toString(dotFormatter));
        res.setHeader("Content-Type", "text/html");
        res.send(renderPage(`${graph.name} features`, svgContent));
      } catch (error) {
        console.error("Error rendering graph:", error);
        res.status(500).send(String(error));
      }
    });

    app.listen(port, () => {
      console.log(`Graphviz Visualization server running at http://localhost:${port}`);
    });
  }
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
