import {
    suite,
    test,
} from 'mocha-typescript';
import {
    quote,
} from './command';
import type {
    Config,
} from './config';
import {
    activateBase,
    collectRequirements,
    createBackend,
} from './testenv';
import {
    captureProgress,
    FakeResponse,
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
    'cmake-build': {commands: ['cmake .'], kind: 'build-inplace', requirements: [['cmake', null]], supported_envs: ['conda']},
    'tests': {commands: ['pytest'], kind: 'test-inplace', requirements: [[null, 'pytest']]},
};

function envConfig(dir: string, node: ConfigNode): Promise<Config> {
    return testConfig({
        cwd: dir,
        describe: '1.0.0',
        node: {
            project: {name: 'demo', packages: [{tools: ['tests']}], requirements: [['numpy', null]]},
            tools: TOOLS,
            ...node,
        },
    });
}

@suite('collectRequirements')
export class CollectRequirementsTest {
    @test
    async 'tools are counted once and filtered by backend'(): Promise<void> {
        const config = await envConfig(await tmpDir(), {
            project: {
                name: 'demo',
                packages: [{tools: ['tests', 'cmake-build']}, {name: 'other', path: 'other', tools: ['tests']}],
                requirements: [['numpy', null]],
            },
            testenv: {use: 'none'},
        });
        assert.deepStrictEqual(collectRequirements(config), [['numpy', null], [null, 'pytest']]);
    }
}

@suite('none backend')
export class NoBackendTest {
    @test
    async 'does nothing'(): Promise<void> {
        const config = await envConfig(await tmpDir(), {testenv: {use: 'none'}});
        const runner = new FakeRunner();
        const ctx = testContext(config, runner, captureProgress().progress);
        const backend = createBackend('none');
        assert.strictEqual(backend.name, 'none');
        await backend.setup(ctx);
        await backend.installRequirements(ctx);
        await backend.nuke(ctx);
        assert.deepStrictEqual(runner.commands, []);
        assert.deepStrictEqual(ctx.env.prelude, []);
    }
}

@suite('venv backend')
export class VenvBackendTest {
    private dir = '';
    private envPath = '';
    private config?: Config;

    async before(): Promise<void> {
        this.dir = await tmpDir();
        const venvBase = await tmpDir();
        this.config = await envConfig(this.dir, {testenv: {use: 'venv'}, venv: {base_path: venvBase}});
        this.envPath = path.join(venvBase, 'demo-dev-python-X.Y');
    }

    private getConfig(): Config {
        assert(this.config);
        return this.config;
    }

    @test
    async 'setup() creates and activates the environment'(): Promise<void> {
        const config = this.getConfig();
        assert.strictEqual(config.testenv.path, this.envPath);
        const runner = new FakeRunner();
        const ctx = testContext(config, runner, captureProgress().progress);
        await createBackend('venv').setup(ctx);

        assert.deepStrictEqual(runner.commands, [`python3 -m venv ${quote(this.envPath)}`]);
        assert.deepStrictEqual(ctx.env.prelude, [
            '[[ -n "${VIRTUAL_ENV}" ]] && deactivate &> /dev/null',
            `source ${quote(path.join(this.envPath, 'bin', 'activate'))}`,
        ]);
        assert.deepStrictEqual(ctx.env.toRecord(), {PROJECT_VERSION: '1.0.0'});
    }

    @test
    async 'setup() keeps an existing environment'(): Promise<void> {
        await fs.mkdirp(this.envPath);
        const runner = new FakeRunner();
        await createBackend('venv').setup(testContext(this.getConfig(), runner, captureProgress().progress));
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    async 'installRequirements() runs once per requirement set'(): Promise<void> {
        await fs.writeFile(path.join(this.dir, 'requirements.txt'), 'scipy\n');
        const runner = new FakeRunner();
        const {progress, output} = captureProgress();
        const ctx = testContext(this.getConfig(), runner, progress);
        const backend = createBackend('venv');

        await backend.installRequirements(ctx);
        assert.deepStrictEqual(runner.commands, [
            'pip install -U pytest',
            'pip install -U -r requirements.txt',
            'pip install -e ./',
        ]);
        assert.strictEqual(runner.calls[2].options.cwd, this.dir);
        assert(await fs.pathExists(path.join(this.envPath, '.skip_install')));

        await backend.installRequirements(ctx);
        assert.strictEqual(runner.calls.length, 3);
        assert(output().includes('Skipping install+update of requirements.\n'));
    }

    @test
    async 'nuke() only shows how to remove the environment'(): Promise<void> {
        const runner = new FakeRunner();
        await createBackend('venv').nuke(testContext(this.getConfig(), runner, captureProgress().progress));
        assert.deepStrictEqual(runner.commands, [`echo rm -rv ${quote(this.envPath)}`, 'git clean -fdX']);
        assert.strictEqual(runner.calls[1].options.cwd, this.dir);
    }
}

const RENDERED_RECIPE = `requirements:
  build:
    - python 3.7.1 h0371630_7
  run:
    - demo
    - "numpy >=1.16"
test:
  requires:
    - pytest
`;

@suite('conda backend')
export class CondaBackendTest {
    private dir = '';
    private condaBase = '';
    private envPath = '';
    private config?: Config;

    async before(): Promise<void> {
        this.dir = await tmpDir();
        this.condaBase = await tmpDir();
        // An existing installation: nothing is downloaded.
        await fs.mkdirp(path.join(this.condaBase, 'bin'));
        this.config = await envConfig(this.dir, {
            conda: {base_path: this.condaBase, channels: ['conda-forge'], pinning: 'python 3.7'},
            testenv: {use: 'conda'},
        });
        this.envPath = path.join(this.condaBase, 'envs', 'demo-dev-python-3.7');
    }

    private getConfig(): Config {
        assert(this.config);
        return this.config;
    }

    @test
    async 'setup() creates a missing environment'(): Promise<void> {
        const config = this.getConfig();
        const runner = new FakeRunner(command =>
            command === 'conda env list --json' ? {stdout: JSON.stringify({envs: [this.condaBase]})} : {});
        const ctx = testContext(config, runner, captureProgress().progress);
        await createBackend('conda').setup(ctx);

        assert.deepStrictEqual(runner.commands, [
            'conda env list --json',
            'conda create -n demo-dev-python-3.7 python=3.7 -y',
            'conda config --env --remove-key channels',
            'conda config --env --add channels conda-forge',
            'conda config --env --set channel_priority strict',
        ]);
        assert.strictEqual(await fs.readFile(path.join(this.envPath, 'conda-meta', 'pinning'), 'utf-8'), 'python=3.7\n');
        assert.deepStrictEqual(ctx.env.prelude, [
            '[[ -n "${CONDA_PREFIX_1}" ]] && conda deactivate &> /dev/null',
            '[[ -n "${CONDA_PREFIX}" ]] && conda deactivate &> /dev/null',
            activateBase(config),
            'conda activate demo-dev-python-3.7',
        ]);
        assert.deepStrictEqual(ctx.env.toRecord(), {
            CONDA_BLD_PATH: path.join(this.envPath, 'conda-bld'),
            PROJECT_VERSION: '1.0.0',
        });
    }

    @test
    async 'setup() reuses a listed environment'(): Promise<void> {
        const runner = new FakeRunner(command =>
            command === 'conda env list --json' ? {stdout: JSON.stringify({envs: [this.envPath]})} : {});
        await createBackend('conda').setup(testContext(this.getConfig(), runner, captureProgress().progress));
        assert(!runner.commands.some(command => command.startsWith('conda create')));
    }

    @test
    async 'installRequirements() installs tool and recipe requirements'(): Promise<void> {
        await fs.outputFile(path.join(this.dir, 'tools', 'conda.recipe', 'meta.yaml'), 'package: {name: demo}\n');
        const respond = (command: string): FakeResponse => {
            if (command.startsWith('conda render'))
                fs.outputFileSync(command.split(' ')[3], RENDERED_RECIPE);
            return {};
        };
        const runner = new FakeRunner(respond);
        await createBackend('conda').installRequirements(testContext(this.getConfig(), runner, captureProgress().progress));

        const commands = runner.commands;
        assert.strictEqual(commands.length, 5);
        assert.strictEqual(commands[0], 'conda install --update-deps -y -n base conda conda-build');
        assert.strictEqual(commands[1], 'conda install --update-deps -y numpy pip');
        assert(commands[2].startsWith('conda render -f '));
        assert(commands[2].endsWith(` ${quote(path.join(this.dir, 'tools', 'conda.recipe'))} --variants ` +
                                    quote('{python: \'3.7\'}')));
        assert.strictEqual(commands[3], 'conda install --update-deps -y \'numpy >=1.16\' pytest \'python 3.7.1\'');
        assert.strictEqual(commands[4], 'pip install --upgrade pytest');
        assert(await fs.pathExists(path.join(this.envPath, '.skip_install')));
    }

    @test
    async 'nuke() removes the environment'(): Promise<void> {
        const config = this.getConfig();
        const runner = new FakeRunner();
        await createBackend('conda').nuke(testContext(config, runner, captureProgress().progress));
        assert.deepStrictEqual(runner.commands, ['conda uninstall -n demo-dev-python-3.7 --all -y', 'git clean -fdX']);
        assert.deepStrictEqual(runner.calls[0].options.prelude, [activateBase(config)]);
        assert.strictEqual(runner.calls[1].options.cwd, this.dir);
    }
}
