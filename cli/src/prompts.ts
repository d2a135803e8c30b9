import inquirer from 'inquirer';
import type { VelocityDataset } from '../../src/dataset/types';

export const MENU_PAGE_SIZE = 32;

const BY_NAME_VALUE = '__BY_NAME__';

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(entry => typeof entry === 'string');
}

export type GenePromptResult = { varNames: string[] } | { groupby: string };

/**
 * Asks how to pick genes: by name from the dataset, or by ranking within a
 * cell annotation.
 */
export async function promptForGenes(dataset: VelocityDataset): Promise<GenePromptResult> {
    const groupings = Object.keys(dataset.obs);
    let source = BY_NAME_VALUE;

    if (groupings.length > 0) {
        const choices: Array<{ name: string; value: string } | inquirer.Separator> = [
            { name: 'Pick genes by name', value: BY_NAME_VALUE },
            new inquirer.Separator('== Rank genes within =='),
            ...groupings.map(key => ({ name: key, value: key }))
        ];
        const { selection } = await inquirer.prompt({
            type: 'rawlist',
            name: 'selection',
            message: 'Select genes',
            choices,
            pageSize: MENU_PAGE_SIZE
        });
        if (typeof selection === 'string') source = selection;
    }

    if (source !== BY_NAME_VALUE) {
        return { groupby: source };
    }

    const { genes } = await inquirer.prompt({
        type: 'checkbox',
        name: 'genes',
        message: 'Genes to show',
        choices: dataset.varNames,
        pageSize: MENU_PAGE_SIZE,
        validate: (answer: unknown) =>
            isStringArray(answer) && answer.length > 0 ? true : 'Pick at least one gene.'
    });
    return { varNames: isStringArray(genes) ? genes : [] };
}
