#!/usr/bin/env node
/**
 * @module
 * Command line interface: `rondo [task]`.
 */
import {
    Command,
} from 'commander';
import {
    ExternalProcessFailure,
} from './errors';
import {
    newRunner,
} from './index';
import {
    createProgress,
} from './progress';
import type {
    Task,
} from './task';
import fs = require('fs-extra');
import path = require('path');

interface CliOptions {
    list?: boolean;
    set: string[];
    cwd?: string;
}

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

/**
 * One line per task: name, description and prerequisites.
 */
export function formatTaskList(tasks: Task[]): string {
    const width = Math.max(0, ...tasks.map(task => task.name.length));
    return tasks.map(task => {
        let line = `${task.name.padEnd(width)}  ${task.description || task.name}`;
        if (task.prerequisites.length)
            line += ` [after: ${task.prerequisites.join(', ')}]`;
        return `${line}\n`;
    }).join('');
}

/**
 * Exit code for a failed run: that of the failing command, 1 otherwise.
 */
export function exitCode(e: unknown): number {
    if (e instanceof ExternalProcessFailure && e.code > 0)
        return e.code;
    return 1;
}

async function packageVersion(): Promise<string> {
    const pkg: unknown = await fs.readJson(path.join(__dirname, '..', 'package.json'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string')
        return pkg.version;
    return '0.0.0';
}

async function main(argv: string[]): Promise<number> {
    const program = new Command();
    program
        .name('rondo')
        .description('Run the development workflow of a project: lint, build, test, package, deploy.')
        .version(await packageVersion())
        .argument('[task]', 'task to run; default: robot')
        .option('-l, --list', 'list the tasks and exit')
        .option('-s, --set <key=value>', 'override a configuration key (repeatable)', collect, [])
        .option('-C, --cwd <dir>', 'project root');
    program.parse(argv);
    const options = program.opts<CliOptions>();
    const task: string | undefined = program.args[0];

    const progress = createProgress();
    try {
        const runner = await newRunner({cwd: options.cwd, overrides: options.set, progress});
        if (options.list) {
            process.stdout.write(formatTaskList(runner.list()));
            return 0;
        }
        const run = await runner.run(task);
        progress.info(`Completed: ${run.order.join(', ')}`);
        return 0;
    } catch (e) {
        progress.unrender();
        progress.error(e instanceof Error ? e.message : String(e));
        return exitCode(e);
    }
}

if (require.main === module) {
    main(process.argv).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        process.stderr.write(`${e instanceof Error ? e.stack : String(e)}\n`);
        process.exitCode = 1;
    });
}
