import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../../src/errors';
import { deserializeDataset, isDatasetBundle } from '../../src/dataset/serialization';
import { parseVelocityPlotOptions } from '../../src/config/options';
import { createConsoleLogger } from '../../src/utils/logger';
import { createPlotlySurface } from '../../src/viewports/plotly/plotlyFigure';
import { createPlotlyCollaborators, renderVelocityPanels } from '../../src/velocity';
import type { VelocityDataset } from '../../src/dataset/types';
import { USAGE, parseCliArgs } from './args';
import type { CliArgs } from './args';
import {
    printError,
    printField,
    printHeader,
    printInfo,
    printLayout,
    printNameList,
    printSuccess,
    printWarning
} from './format';
import { promptForGenes } from './prompts';

function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

export function loadDataset(file: string): VelocityDataset {
    const bundle = readJson(file);
    if (!isDatasetBundle(bundle)) {
        throw new ConfigurationError(`${file} is not a dataset bundle.`);
    }
    return deserializeDataset(bundle);
}

/**
 * Config file options first, flags on top. The CLI saves instead of
 * showing unless told otherwise.
 */
export function collectOptions(args: CliArgs): Record<string, unknown> {
    const fromFile = args.configPath ? readJson(args.configPath) : {};
    if (typeof fromFile !== 'object' || fromFile === null || Array.isArray(fromFile)) {
        throw new ConfigurationError(`${args.configPath} must hold a JSON object.`);
    }
    return { show: false, save: true, ...fromFile, ...args.options };
}

async function main(argv: string[]) {
    if (argv.includes('--help') || argv.length === 0) {
        console.log(USAGE);
        return;
    }
    const args = parseCliArgs(argv);
    const dataset = loadDataset(args.datasetPath);
    const raw = collectOptions(args);

    if (raw.varNames === undefined && raw.groupby === undefined) {
        if (!process.stdin.isTTY) {
            throw new ConfigurationError('No genes given: pass --genes or --groupby.');
        }
        printInfo('No genes given; pick them from the dataset.');
        Object.assign(raw, await promptForGenes(dataset));
    }

    const { options, validation } = parseVelocityPlotOptions(raw);
    validation.warnings.forEach(printWarning);
    if (!validation.valid) {
        throw new ConfigurationError('Invalid velocity plot options.', validation.errors);
    }

    printHeader('Velocity panels', path.basename(args.datasetPath));
    printField('Cells', dataset.obsNames.length);
    printField('Genes', dataset.varNames.length);

    const result = renderVelocityPanels(
        dataset,
        options,
        createPlotlyCollaborators({
            createSurface: plan => createPlotlySurface(plan, { theme: args.theme }),
            logger: createConsoleLogger({ verbose: args.verbose })
        })
    );

    printNameList('Selected', result.genes);
    printLayout(result.plan);
    if (options.mode === 'stochastic' && result.summary.stochasticLines === 0) {
        printWarning('No fit has a variance layer; covariance panels carry no lines.');
    }
    if (result.savedTo) {
        printSuccess(`Wrote ${result.savedTo}`);
    }
}

main(process.argv.slice(2)).catch((error: unknown) => {
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
