import chalk from 'chalk';
import Table from 'cli-table3';
import type { BindingRow, CommandAction, GlobalState, KeyId } from '../types/soundboard.js';

export function outputJSON(data: unknown) {
    console.log(JSON.stringify({ success: true, data }, null, 2));
}

export function outputTable(headers: string[], rows: Array<Array<string | number>>) {
    console.log(renderTable(headers, rows));
}

export function renderTable(headers: string[], rows: Array<Array<string | number>>): string {
    const table = new Table({
        head: headers.map(h => chalk.cyan(h)),
        style: { head: [], border: [] }
    });
    table.push(...rows);
    return table.toString();
}

export function onOff(flag: boolean): string {
    return flag ? 'on' : 'off';
}

export function bindingTableRows(rows: BindingRow[]): Array<Array<string | number>> {
    return rows.map(row => [row.key, row.group, row.sounds, row.orderIndex]);
}

/**
 * Key → group → sound count table, with the global flags underneath.
 */
export function renderBindingTable(rows: BindingRow[], globals?: GlobalState): string {
    const lines: string[] = [];
    if (rows.length === 0) {
        lines.push(chalk.yellow('No groups are bound to keys.'));
    } else {
        lines.push(renderTable(['Key', 'Group', 'Sounds', 'Order'], bindingTableRows(rows)));
    }
    if (globals) {
        lines.push(`${chalk.bold('Loop')}: ${onOff(globals.loopFlag)}  ${chalk.bold('Stack')}: ${onOff(globals.stackFlag)}`);
    }
    return lines.join('\n');
}

const ACTION_LABELS: Record<CommandAction, string> = {
    'exit': 'Stop everything and quit',
    'stop-all': 'Stop all sounds',
    'show-bindings': 'Show key bindings',
    'toggle-loop': 'Toggle loop mode for the next triggers',
    'toggle-stack': 'Toggle stack mode for the next triggers',
};

export function commandLegendRows(commandKeys: ReadonlyArray<readonly [KeyId, CommandAction]>): string[][] {
    return commandKeys.map(([key, action]) => [key, ACTION_LABELS[action]]);
}
