import {
    suite,
    test,
} from 'mocha-typescript';
import type {
    Config,
} from './config';
import {
    ExternalProcessFailure,
    TemplateError,
} from './errors';
import {
    formatContext,
    lintCommands,
    runPhase,
} from './phase';
import {
    captureProgress,
    FakeRunner,
    testConfig,
    testContext,
    tmpDir,
} from './testutil';
import {
    ConfigNode,
} from './tree';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

const TOOLS: ConfigNode = {
    'build': {
        check_vars: ['RONDO_TEST_UNSET_VAR'],
        commands: ['make -C {package.path}'],
        extra_vars: {CFLAGS: '-I{package.path}', PYTHONPATH: 'lib'},
        kind: 'build-inplace',
    },
    'conda-only': {commands: ['never'], kind: 'test-inplace', supported_envs: ['conda']},
    'lint': {
        commands_feature: ['lint diff {config.git.merge_branch}'],
        commands_master: ['lint all'],
        kind: 'lint-static',
    },
    'tests': {commands: ['pytest {env.PYTHONPATH}'], kind: 'test-inplace'},
    'version': {
        destination: '{package.dist_name}/version.txt',
        kind: 'write-version',
        template: 'v{config.git.tag_version}\n',
    },
};

function projectConfig(dir: string, branch?: string, extra?: ConfigNode): Promise<Config> {
    return testConfig({
        branch,
        cwd: dir,
        describe: '1.2.3',
        node: {
            project: {name: 'demo', packages: [{tools: ['version', 'lint', 'build', 'tests', 'conda-only']}]},
            testenv: {use: 'none'},
            tools: TOOLS,
            ...extra,
        },
    });
}

@suite('runPhase')
export class RunPhaseTest {
    @test
    async 'write-version'(): Promise<void> {
        const dir = await tmpDir();
        const config = await projectConfig(dir);
        const {progress, output} = captureProgress();
        await runPhase(testContext(config, new FakeRunner(), progress), 'write-version');
        assert.strictEqual(await fs.readFile(path.join(dir, 'demo', 'version.txt'), 'utf-8'), 'v1.2.3\n');
        assert.strictEqual(output(), '   TOOL  version (demo)\nVersion file written to: demo/version.txt\n');
    }

    @test
    async 'commands run in the package directory'(): Promise<void> {
        const dir = await tmpDir();
        const config = await projectConfig(dir);
        const runner = new FakeRunner();
        await runPhase(testContext(config, runner, captureProgress().progress), 'lint-static');
        assert.deepStrictEqual(runner.calls, [{command: 'lint all', options: {cwd: dir, env: {}, prelude: []}}]);
    }

    @test
    async 'build-inplace extends the environment of later tools'(): Promise<void> {
        const dir = await tmpDir();
        const config = await projectConfig(dir);
        const runner = new FakeRunner();
        const {progress, output} = captureProgress();
        const ctx = testContext(config, runner, progress);

        await runPhase(ctx, 'build-inplace');
        assert.deepStrictEqual(runner.commands, ['make -C .']);
        assert.deepStrictEqual(ctx.env.toRecord(), {CFLAGS: '-I.', PYTHONPATH: path.join(dir, 'lib')});
        assert.strictEqual(await fs.readFile(path.join(dir, 'activate.sh'), 'utf-8'),
                           'export CFLAGS="${CFLAGS:+${CFLAGS} }"-I.\n' +
                           `export PYTHONPATH="\${PYTHONPATH:+\${PYTHONPATH}:}"${path.join(dir, 'lib')}\n`);

        await runPhase(ctx, 'test-inplace');
        assert.deepStrictEqual(runner.commands, ['make -C .', `pytest ${path.join(dir, 'lib')}`]);
        assert(output().includes('warning: tool conda-only skipped: not supported with none\n'));
    }

    @test
    async 'later packages see variables exported by earlier ones'(): Promise<void> {
        const dir = await tmpDir();
        const config = await testConfig({
            cwd: dir,
            node: {
                project: {
                    name: 'demo',
                    packages: [{name: 'a', path: 'a', tools: ['inplace']}, {name: 'b', path: 'b', tools: ['inplace']}],
                },
                testenv: {use: 'none'},
                tools: {inplace: {commands: ['make'], extra_vars: {PYTHONPATH: 'lib'}, kind: 'build-inplace'}},
            },
        });
        const runner = new FakeRunner();
        const ctx = testContext(config, runner, captureProgress().progress);
        await runPhase(ctx, 'build-inplace');

        const libA = path.join(dir, 'a', 'lib');
        const libB = path.join(dir, 'b', 'lib');
        assert.deepStrictEqual(runner.calls.map(call => call.options.cwd), [path.join(dir, 'a'), path.join(dir, 'b')]);
        assert.deepStrictEqual(runner.calls[0].options.env, {});
        assert.strictEqual(ctx.env.get('PYTHONPATH', {}), `${libA}:${libB}`);
        assert.deepStrictEqual(ctx.env.toRecord(), {PYTHONPATH: `${libA}:${libB}`});
    }

    @test
    async 'templates are checked before any command runs'(): Promise<void> {
        const config = await testConfig({
            cwd: await tmpDir(),
            node: {
                project: {name: 'demo', packages: [{tools: ['broken']}]},
                testenv: {use: 'none'},
                tools: {broken: {commands: ['ok', 'bad {package.version}'], kind: 'test-inplace'}},
            },
        });
        const runner = new FakeRunner();
        await assert.rejects(runPhase(testContext(config, runner, captureProgress().progress), 'test-inplace'),
                             TemplateError);
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    async 'failing command'(): Promise<void> {
        const dir = await tmpDir();
        const config = await projectConfig(dir);
        const runner = new FakeRunner(() => ({code: 2, stderr: 'E501'}));
        await assert.rejects(runPhase(testContext(config, runner, captureProgress().progress), 'lint-static'),
                             (e: unknown) => {
                                 assert(e instanceof ExternalProcessFailure);
                                 assert.strictEqual(e.code, 2);
                                 assert.strictEqual(e.stderr, 'E501');
                                 return true;
                             });
    }

    @test
    async 'formatContext()'(): Promise<void> {
        const dir = await tmpDir();
        const config = await projectConfig(dir);
        const ctx = testContext(config, new FakeRunner(), captureProgress().progress);
        const fmt = formatContext(ctx, config.packages[0]);
        assert.strictEqual(fmt.config, config.tree.root);
        assert.deepStrictEqual(fmt.package, {
            abs_path: dir,
            dist_name: 'demo',
            name: 'demo',
            path: '.',
            tools: ['version', 'lint', 'build', 'tests', 'conda-only'],
        });
        assert.deepStrictEqual(fmt.env, {});
    }
}

@suite('lintCommands')
export class LintCommandsTest {
    @test
    async 'feature branches'(): Promise<void> {
        const config = await projectConfig(await tmpDir(), 'feature');
        const tool = config.tools.lookup('lint');
        assert(tool.kind === 'lint-static');
        assert.deepStrictEqual(lintCommands(config, tool), ['lint diff {config.git.merge_branch}']);
    }

    @test
    async 'absolute lints everything'(): Promise<void> {
        const config = await projectConfig(await tmpDir(), 'feature', {absolute: true});
        const tool = config.tools.lookup('lint');
        assert(tool.kind === 'lint-static');
        assert.deepStrictEqual(lintCommands(config, tool), ['lint all']);
    }

    @test
    async 'unknown branch lints everything'(): Promise<void> {
        const config = await projectConfig(await tmpDir(), '');
        const tool = config.tools.lookup('lint');
        assert(tool.kind === 'lint-static');
        assert.deepStrictEqual(lintCommands(config, tool), ['lint all']);
    }
}
