/**
 * @module
 * The development workflow as a task graph.
 */
import {
    sanitizeBranch,
} from './git';
import {
    runPhase,
} from './phase';
import {
    TaskRegistry,
} from './registry';
import type {
    Task,
    TaskContext,
} from './task';
import type {
    Phase,
} from './tools';

function phaseTask(name: Phase, prerequisites: string[], description: string): Task {
    return {
        description,
        fn: ctx => runPhase(ctx, name),
        name,
        prerequisites,
    };
}

function groupTask(name: string, prerequisites: string[], description: string): Task {
    return {
        description,
        fn: () => undefined,
        name,
        prerequisites,
    };
}

/**
 * All tasks of the workflow.
 */
export function workflowTasks(): Task[] {
    return [
        {
            description: 'Fetch the merge branch when it is absent.',
            fn: ({config, runner, progress}: TaskContext) =>
                sanitizeBranch(runner, progress, config.git.mergeBranch, config.cwd),
            name: 'sanitize-git',
            prerequisites: [],
        },
        {
            description: 'Create and activate the test environment.',
            fn: ctx => ctx.backend.setup(ctx),
            name: 'setup-testenv',
            prerequisites: [],
        },
        {
            description: 'Install the requirements of the project and its tools.',
            fn: ctx => ctx.backend.installRequirements(ctx),
            name: 'install-requirements',
            prerequisites: ['setup-testenv'],
        },
        phaseTask('write-version', [], 'Write version files derived from git describe.'),
        phaseTask('lint-static', ['install-requirements', 'sanitize-git', 'write-version'], 'Run static linters.'),
        phaseTask('build-inplace', ['install-requirements', 'sanitize-git', 'write-version'], 'Build in-place.'),
        phaseTask('test-inplace', ['build-inplace'], 'Run tests in-place.'),
        {
            description: 'Upload coverage reports, when upload_coverage is set.',
            fn: async ctx => {
                if (!ctx.config.uploadCoverage) {
                    ctx.progress.info('Skipping coverage upload: upload_coverage is not set.');
                    return;
                }
                await runPhase(ctx, 'upload-coverage');
            },
            name: 'upload-coverage',
            prerequisites: ['test-inplace'],
        },
        phaseTask('lint-dynamic', ['build-inplace'], 'Run dynamic linters.'),
        phaseTask('build-docs', ['build-inplace'], 'Build the documentation.'),
        {...phaseTask('upload-docs', ['build-docs'], 'Upload the documentation.'), deploys: true},
        phaseTask('build-packages', ['install-requirements', 'write-version'], 'Build the packages.'),
        {...phaseTask('deploy', ['build-packages'], 'Upload the packages.'), deploys: true},
        {
            description: 'Remove the test environment and untracked ignored files. Use at your own risk.',
            fn: ctx => ctx.backend.nuke(ctx),
            name: 'nuclear',
            prerequisites: ['setup-testenv'],
        },
        groupTask('quality',
                  ['lint-static', 'build-inplace', 'test-inplace', 'upload-coverage', 'lint-dynamic', 'build-docs'],
                  'Run all quality assurance tasks: linting and in-place testing.'),
        groupTask('robot-nodeploy', ['quality', 'build-packages'], 'Run all tasks, except deployment and nuclear.'),
        {
            ...groupTask('robot', ['quality', 'upload-docs', 'deploy'], 'Run all tasks, except nuclear.'),
            default: true,
            withoutDeploy: 'robot-nodeploy',
        },
    ];
}

/**
 * Builds and validates the workflow registry.
 */
export function createWorkflow(): TaskRegistry {
    const registry = new TaskRegistry(workflowTasks());
    registry.validate();
    return registry;
}
