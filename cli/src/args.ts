import { ConfigurationError } from '../../src/errors';
import type { PlotlyThemeMode } from '../../src/viewports/plotly/plotlyTheme';

export type CliArgs = {
    datasetPath: string;
    configPath?: string;
    theme: PlotlyThemeMode;
    verbose: boolean;
    /** Plot options given as flags; checked later with the config file. */
    options: Record<string, unknown>;
};

type FlagSpec = {
    option: string;
    parse: (value: string) => unknown;
};

export function parseListInput(input: string): string[] {
    return input
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

function parseNumber(value: string): number {
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : Number.NaN;
}

const VALUE_FLAGS: Record<string, FlagSpec> = {
    '--genes': { option: 'varNames', parse: parseListInput },
    '--groupby': { option: 'groupby', parse: value => value },
    '--groups': { option: 'groups', parse: parseListInput },
    '--vkey': { option: 'vkey', parse: value => value },
    '--basis': { option: 'basis', parse: value => value },
    '--mode': { option: 'mode', parse: value => value },
    '--layers': { option: 'layers', parse: value => (value === 'all' ? 'all' : parseListInput(value)) },
    '--fits': { option: 'fits', parse: value => (value === 'all' ? 'all' : parseListInput(value)) },
    '--color': { option: 'color', parse: value => value },
    '--color-map': {
        option: 'colorMap',
        parse: value => {
            const maps = parseListInput(value);
            return maps.length === 2 ? maps : value;
        }
    },
    '--legend-loc': { option: 'legendLoc', parse: value => value },
    '--ncols': { option: 'ncols', parse: parseNumber },
    '--size': { option: 'size', parse: parseNumber },
    '--alpha': { option: 'alpha', parse: parseNumber },
    '--font-size': { option: 'fontSize', parse: parseNumber },
    '--dpi': { option: 'dpi', parse: parseNumber },
    '--save': { option: 'save', parse: value => value },
    '--save-dir': { option: 'saveDir', parse: value => value }
};

const BOOLEAN_FLAGS: Record<string, { option: string; value: boolean }> = {
    '--use-raw': { option: 'useRaw', value: true },
    '--no-colorbar': { option: 'colorbar', value: false }
};

export const USAGE = [
    'Usage: velocity-panels <bundle.json> [options]',
    '',
    '  --genes a,b          genes to show',
    '  --groupby key        rank genes per group of a cell annotation',
    '  --groups a,b         restrict --groupby to matching groups',
    '  --mode stochastic    add covariance panels',
    '  --layers a,b|all     layers shown on the embedding',
    '  --fits a,b|all       fits drawn on the phase portraits',
    '  --ncols n            genes per row',
    '  --config file.json   plot options as JSON (flags win)',
    '  --theme light|dark   figure theme',
    '  --save name          append to the output file name',
    '  --save-dir dir       output directory (default ./figures)',
    '  --verbose            log selection and layout details'
].join('\n');

/**
 * Splits argv into the dataset path, CLI-only switches and plot options.
 * Unknown flags are rejected.
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const options: Record<string, unknown> = {};
    const positional: string[] = [];
    let configPath: string | undefined;
    let theme: PlotlyThemeMode = 'light';
    let verbose = false;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }
        if (arg === '--verbose') {
            verbose = true;
            continue;
        }
        const toggle = BOOLEAN_FLAGS[arg];
        if (toggle) {
            options[toggle.option] = toggle.value;
            continue;
        }
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
            throw new ConfigurationError(`Missing value for ${arg}.`);
        }
        i += 1;
        if (arg === '--config') {
            configPath = value;
        } else if (arg === '--theme') {
            if (value !== 'light' && value !== 'dark') {
                throw new ConfigurationError(`--theme must be light or dark, got "${value}".`);
            }
            theme = value;
        } else {
            const spec = VALUE_FLAGS[arg];
            if (!spec) {
                throw new ConfigurationError(`Unknown flag ${arg}.`);
            }
            options[spec.option] = spec.parse(value);
        }
    }

    if (positional.length !== 1) {
        throw new ConfigurationError('Expected exactly one dataset bundle path.');
    }
    return { datasetPath: positional[0], configPath, theme, verbose, options };
}
