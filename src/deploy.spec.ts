import {
    suite,
    test,
} from 'mocha-typescript';
import type {
    Config,
} from './config';
import {
    checkEnvVar,
    findAssets,
    needDeployment,
    writeSha256Sum,
} from './deploy';
import {
    RondoError,
} from './errors';
import {
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

const DEPLOY_TOOL: ConfigNode = {
    binary_asset_patterns: ['dist/*.whl'],
    commands: ['upload {deploy_label} {assets}'],
    deploy_labels: ['main'],
    deploy_vars: ['RONDO_TEST_UNSET_TOKEN'],
    include_sha256: true,
    kind: 'deploy',
    noarch_asset_patterns: ['dist/*.tar.gz'],
};

function deployConfig(dir: string, describe: string, flags: ConfigNode, tools?: ConfigNode): Promise<Config> {
    const toolNode = tools || {upload: DEPLOY_TOOL};
    return testConfig({
        cwd: dir,
        describe,
        node: {
            ...flags,
            project: {name: 'demo', packages: [{tools: Object.keys(toolNode)}]},
            testenv: {use: 'none'},
            tools: toolNode,
        },
    });
}

@suite('needDeployment')
export class NeedDeploymentTest {
    @test
    async 'deploy flag not set'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0', {deploy_binary: true});
        const {progress, output} = captureProgress();
        assert.strictEqual(needDeployment(config, 'x', false, ['main'], progress), false);
        assert.strictEqual(output(), 'Skipping x: deploy_noarch is not set.\n');
    }

    @test
    async 'binary deployment uses its own flag'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0', {deploy_noarch: true});
        const {progress, output} = captureProgress();
        assert.strictEqual(needDeployment(config, 'x', true, ['main'], progress), false);
        assert.strictEqual(output(), 'Skipping x: deploy_binary is not set.\n');
        assert.strictEqual(needDeployment(config, 'x', false, ['main'], progress), true);
    }

    @test
    async 'deploy flag not set and label not accepted'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0', {});
        const {progress, output} = captureProgress();
        assert.strictEqual(needDeployment(config, 'x', false, ['test', 'dev'], progress), false);
        assert.strictEqual(output(), 'Skipping x: deploy_noarch is not set.\n');
    }

    @test
    async 'version is not a release'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0-3-gabcdef0', {deploy_noarch: true});
        const {progress, output} = captureProgress();
        assert.strictEqual(needDeployment(config, 'x', false, ['main', 'test', 'dev'], progress), false);
        assert.strictEqual(output(), 'Skipping x: version 1.0.0.post3 is not a release.\n');
    }

    @test
    async 'deploy label not accepted'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0', {deploy_noarch: true});
        const {progress, output} = captureProgress();
        assert.strictEqual(needDeployment(config, 'x', false, ['test', 'dev'], progress), false);
        assert.strictEqual(output(), 'Skipping x: deploy label main is not one of [test, dev].\n');
    }
}

@suite('deploy helpers')
export class DeployHelpersTest {
    @test
    'checkEnvVar()'(): void {
        const env = {EMPTY: '', SET: 'test-secret'};
        assert.strictEqual(checkEnvVar('SET', env), 'The environment variable SET is not empty.');
        assert.strictEqual(checkEnvVar('EMPTY', env), 'The environment variable EMPTY is empty.');
        assert.strictEqual(checkEnvVar('MISSING', env), 'The environment variable MISSING is not set.');
    }

    @test
    async 'writeSha256Sum()'(): Promise<void> {
        const asset = path.join(await tmpDir(), 'pkg-1.0.tar.gz');
        await fs.writeFile(asset, 'hello\n');
        assert.strictEqual(await writeSha256Sum(asset), `${asset}.sha256`);
        assert.strictEqual(await fs.readFile(`${asset}.sha256`, 'utf-8'),
                           '5891b5b522d5df086d0ff0b110fbd9d21bb4fc7163af34d08286a2e846f6be03  pkg-1.0.tar.gz\n');
    }

    @test
    async 'findAssets() skips checksums'(): Promise<void> {
        const dir = await tmpDir();
        await fs.outputFile(path.join(dir, 'dist', 'b.tar.gz'), 'b');
        await fs.outputFile(path.join(dir, 'dist', 'a.tar.gz'), 'a');
        await fs.outputFile(path.join(dir, 'dist', 'a.tar.gz.sha256'), 'x');
        assert.deepStrictEqual(await findAssets(['dist/*'], dir), ['dist/a.tar.gz', 'dist/b.tar.gz']);
        assert.deepStrictEqual(await findAssets([], dir), []);
    }
}

@suite('deploy tool')
export class DeployToolTest {
    @test
    async 'uploads assets with checksums'(): Promise<void> {
        const dir = await tmpDir();
        await fs.outputFile(path.join(dir, 'dist', 'demo-1.0.0.tar.gz'), 'sdist');
        const config = await deployConfig(dir, '1.0.0', {deploy_noarch: true});
        const runner = new FakeRunner();
        const {progress, output} = captureProgress();
        await runPhase(testContext(config, runner, progress), 'deploy');

        assert.deepStrictEqual(runner.commands, ['upload main dist/demo-1.0.0.tar.gz dist/demo-1.0.0.tar.gz.sha256']);
        assert.strictEqual(runner.calls[0].options.cwd, dir);
        assert(await fs.pathExists(path.join(dir, 'dist', 'demo-1.0.0.tar.gz.sha256')));
        assert(output().includes('The environment variable RONDO_TEST_UNSET_TOKEN is not set.\n'));
        assert(output().includes('Preparing for upload of demo (binary=true)\n  Searching for dist/*.whl\nNo assets found\n'));
    }

    @test
    async 'missing assets fail a deployment'(): Promise<void> {
        const dir = await tmpDir();
        const config = await deployConfig(dir, '1.0.0', {deploy_noarch: true}, {
            upload: {...DEPLOY_TOOL, noarch_asset_patterns: ['dist/demo-1.0.0.tar.gz']},
        });
        const runner = new FakeRunner();
        await assert.rejects(runPhase(testContext(config, runner, captureProgress().progress), 'deploy'),
                             (e: unknown) => {
                                 assert(e instanceof RondoError);
                                 assert.strictEqual(e.message, 'could not find assets for upload of demo (binary=false): ' +
                                                               'dist/demo-1.0.0.tar.gz');
                                 return true;
                             });
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    async 'missing assets are skipped when deployment is off'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0', {});
        const runner = new FakeRunner();
        const {progress, output} = captureProgress();
        await runPhase(testContext(config, runner, progress), 'deploy');
        assert.deepStrictEqual(runner.commands, []);
        assert(output().includes('  Searching for dist/*.tar.gz\nNo assets found\n' +
                                 'Skipping upload of demo (binary=false): deploy_noarch is not set.\n'));
    }

    @test
    async 'checksums are prepared when deployment is off'(): Promise<void> {
        const dir = await tmpDir();
        await fs.outputFile(path.join(dir, 'dist', 'demo-1.0.0.tar.gz'), 'sdist');
        const config = await deployConfig(dir, '1.0.0', {});
        const runner = new FakeRunner();
        await runPhase(testContext(config, runner, captureProgress().progress), 'deploy');
        assert.deepStrictEqual(runner.commands, []);
        assert(await fs.pathExists(path.join(dir, 'dist', 'demo-1.0.0.tar.gz.sha256')));
    }

    @test
    async 'a failed upload does not stop the next asset group'(): Promise<void> {
        const dir = await tmpDir();
        await fs.outputFile(path.join(dir, 'dist', 'demo-1.0.0-py3-none-any.whl'), 'wheel');
        await fs.outputFile(path.join(dir, 'dist', 'demo-1.0.0.tar.gz'), 'sdist');
        const config = await deployConfig(dir, '1.0.0', {deploy_binary: true, deploy_noarch: true}, {
            upload: {...DEPLOY_TOOL, include_sha256: false},
        });
        const runner = new FakeRunner(command => command.endsWith('.whl') ? {code: 1} : {});
        const {progress, output} = captureProgress();
        await runPhase(testContext(config, runner, progress), 'deploy');

        assert.deepStrictEqual(runner.commands, [
            'upload main dist/demo-1.0.0-py3-none-any.whl',
            'upload main dist/demo-1.0.0.tar.gz',
        ]);
        assert(output().includes('error: Deployment failed: upload of demo (binary=true): ' +
                                 'command returned code 1: upload main dist/demo-1.0.0-py3-none-any.whl\n'));
    }
}

@suite('upload-docs-git tool')
export class UploadDocsGitTest {
    private token?: string;

    before(): void {
        this.token = process.env.GITHUB_TOKEN;
        delete process.env.GITHUB_TOKEN;
    }

    after(): void {
        if (this.token !== undefined)
            process.env.GITHUB_TOKEN = this.token;
    }

    @test
    async 'squash-pushes the documentation'(): Promise<void> {
        const dir = await tmpDir();
        await fs.outputFile(path.join(dir, 'doc', 'html', 'index.html'), '<html></html>');
        await fs.outputFile(path.join(dir, 'doc', 'html', '_static', 'a.css'), '');
        const config = await deployConfig(dir, '1.0.0', {deploy_noarch: true}, {
            docs: {deploy_labels: ['main'], docroot: 'doc/html', kind: 'upload-docs-git'},
        });
        const runner = new FakeRunner();
        await runPhase(testContext(config, runner, captureProgress().progress), 'upload-docs');
        assert.deepStrictEqual(runner.commands, [
            'git rev-parse --verify gh-pages',
            'git checkout gh-pages',
            'git ls-tree HEAD -r --name-only | xargs rm -f',
            'GLOBIGNORE=\'.:..\'; cp -rv doc/html/* .',
            'git add -- _static/a.css index.html',
            'git commit -a -m \'Automatic documentation update\' --amend',
            'git checkout master',
            'git push -f origin gh-pages:gh-pages',
        ]);
    }

    @test
    async 'nothing happens for a non-release'(): Promise<void> {
        const config = await deployConfig(await tmpDir(), '1.0.0-1-gabcdef0', {deploy_noarch: true}, {
            docs: {deploy_labels: ['main'], docroot: 'doc/html', kind: 'upload-docs-git'},
        });
        const runner = new FakeRunner();
        await runPhase(testContext(config, runner, captureProgress().progress), 'upload-docs');
        assert.deepStrictEqual(runner.commands, []);
    }
}
