import { expect } from 'chai';
import { describe, it } from 'mocha';
import { InstallEvent } from '../src/interfaces/index.js';
import { UpdateOrchestrator, WingetService } from '../src/services/index.js';
import {
    checkUpdatesHandler,
    formatPackage,
    formatUpdate,
    formatUpgradeListing,
    installUpdatesHandler,
    listPackagesHandler,
    selectUpdates,
    statusHandler,
    WingetSchemas,
} from '../src/tools/winget.tool.js';
import { createLogger, parseConfig } from '../src/utils/index.js';
import { explicitUpdate, FakeLauncher, ok, RecordingSink, regularUpdate, tableLine, unknownUpdate } from './helpers/fakes.js';

const HEADER = ['Name', 'Id', 'Version', 'Available', 'Source'];
const WIDTHS = [24, 16, 12, 11];

const UPGRADES = [
    tableLine(WIDTHS, HEADER),
    '-'.repeat(60),
    tableLine(WIDTHS, ['Foo App', 'Foo.App', '1.0', '2.0', 'winget']),
    tableLine(WIDTHS, ['Bar Tool', 'Bar.Tool', '<Unknown>', '3.1']),
    '2 upgrades available.',
    '',
    'The following packages have an upgrade available, but require explicit targeting for upgrade:',
    tableLine(WIDTHS, HEADER),
    '-'.repeat(60),
    tableLine(WIDTHS, ['Contoso Editor', 'Contoso.Editor', '4.2', '4.3', 'winget']),
].join('\n');

const listing = {
    regular: [regularUpdate({ name: 'Foo App', id: 'Foo.App', version: '1.0', availableVersion: '2.0' })],
    explicit: [explicitUpdate({ name: 'Contoso Editor', id: 'Contoso.Editor', version: '4.2', availableVersion: '4.3' })],
    unknown: [unknownUpdate({ name: 'Bar Tool', id: 'Bar.Tool', version: '<Unknown>', availableVersion: '3.1' })],
};

function createService(launcher: FakeLauncher): WingetService {
    return new WingetService({ config: parseConfig({}), launcher, logger: createLogger({ enableConsoleLogging: false }).child('test') });
}

function textOf(response: { content: Array<{ text: string }> }): string {
    return response.content.map((item) => item.text).join('\n');
}

describe('Winget Tool', function () {
    describe('formatting', function () {
        it('should format packages and updates on one line each', function () {
            expect(formatPackage({ name: 'Local Tool', id: 'MSIX\\Local.Tool', version: '3.2', source: '' })).to.equal('- Local Tool (MSIX\\Local.Tool) 3.2');
            expect(formatUpdate(listing.regular[0])).to.equal('- Foo App (Foo.App) 1.0 -> 2.0 [winget]');
        });

        it('should show every category, marking empty ones', function () {
            expect(formatUpgradeListing({ ...listing, unknown: [] })).to.equal(
                [
                    'Regular updates (1):',
                    '- Foo App (Foo.App) 1.0 -> 2.0 [winget]',
                    '',
                    'Updates requiring explicit targeting (1):',
                    '- Contoso Editor (Contoso.Editor) 4.2 -> 4.3 [winget]',
                    '',
                    'Updates with unknown installed version (0):',
                    '(none)',
                ].join('\n')
            );
        });
    });

    describe('selectUpdates', function () {
        it('should take whole categories in listing order when no ids are given', function () {
            const { selected, missing } = selectUpdates(listing, ['unknown', 'regular']);

            expect(selected.map((update) => update.id)).to.deep.equal(['Foo.App', 'Bar.Tool']);
            expect(missing).to.deep.equal([]);
        });

        it('should follow the caller order, match ids case-insensitively and drop duplicates', function () {
            const { selected, missing } = selectUpdates(listing, ['regular', 'explicit'], ['contoso.editor', 'FOO.APP', 'Foo.App']);

            expect(selected.map((update) => update.id)).to.deep.equal(['Contoso.Editor', 'Foo.App']);
            expect(missing).to.deep.equal([]);
        });

        it('should report ids outside the selected categories as missing', function () {
            const { selected, missing } = selectUpdates(listing, ['regular'], ['Bar.Tool', 'Foo.App']);

            expect(selected.map((update) => update.id)).to.deep.equal(['Foo.App']);
            expect(missing).to.deep.equal(['Bar.Tool']);
        });
    });

    describe('WingetSchemas', function () {
        it('should default install selection to regular updates', function () {
            expect(WingetSchemas.install.parse({})).to.deep.equal({ categories: ['regular'] });
        });

        it('should reject an empty category list', function () {
            expect(WingetSchemas.install.safeParse({ categories: [] }).success).to.be.false;
        });
    });

    describe('statusHandler', function () {
        it('should report the version when winget is available', async function () {
            const response = await statusHandler(createService(new FakeLauncher([], [ok('v1.7.10861\n')])));

            expect(textOf(response)).to.equal('✅ winget is installed and ready!\nVersion: v1.7.10861');
            expect(response.isError).to.be.undefined;
        });

        it('should flag an error when winget is missing', async function () {
            const response = await statusHandler(createService(new FakeLauncher([], [new Error('spawn winget ENOENT')])));

            expect(textOf(response)).to.equal('❌ winget is not available: spawn winget ENOENT');
            expect(response.isError).to.be.true;
        });
    });

    describe('listPackagesHandler', function () {
        it('should turn a failed listing into an error response with the diagnostic', async function () {
            const launcher = new FakeLauncher([], [{ exitCode: 1, stdout: '', stderr: 'Failed when searching source: winget' }]);

            const response = await listPackagesHandler(createService(launcher), { source: 'all' });

            expect(textOf(response)).to.equal('❌ winget list exited with code 1\n\nFailed when searching source: winget');
            expect(response.isError).to.be.true;
        });
    });

    describe('checkUpdatesHandler', function () {
        it('should list each category of pending update', async function () {
            const response = await checkUpdatesHandler(createService(new FakeLauncher([], [ok(UPGRADES)])));

            expect(textOf(response)).to.equal(
                [
                    'Regular updates (1):',
                    '- Foo App (Foo.App) 1.0 -> 2.0 [winget]',
                    '',
                    'Updates requiring explicit targeting (1):',
                    '- Contoso Editor (Contoso.Editor) 4.2 -> 4.3 [winget]',
                    '',
                    'Updates with unknown installed version (1):',
                    '- Bar Tool (Bar.Tool) <Unknown> -> 3.1',
                ].join('\n')
            );
        });
    });

    describe('installUpdatesHandler', function () {
        it('should install the selection in order and answer with the transcript', async function () {
            const service = createService(new FakeLauncher([], [ok(UPGRADES)]));
            const installer = new FakeLauncher();
            const orchestrator = new UpdateOrchestrator({ launcher: installer, sink: new RecordingSink() });
            const seen: Array<[InstallEvent['type'], number]> = [];

            const response = await installUpdatesHandler(
                service,
                orchestrator,
                { ids: ['contoso.editor', 'Foo.App', 'Missing.Pkg'], categories: ['regular', 'explicit'], silent: true },
                {
                    onEvent: async (event, position) => {
                        seen.push([event.type, position]);
                    },
                }
            );

            expect(installer.launches.map((launch) => launch.args)).to.deep.equal([
                ['upgrade', '--id', 'Contoso.Editor', '--version', '4.3', '--silent'],
                ['upgrade', '--id', 'Foo.App', '--version', '2.0', '--silent'],
            ]);
            expect(textOf(response)).to.equal(
                [
                    'No pending update found for: Missing.Pkg',
                    'Installing Contoso Editor (Contoso.Editor) 4.3 [1/2]',
                    '✅ Installed Contoso Editor',
                    'Installing Foo App (Foo.App) 2.0 [2/2]',
                    '✅ Installed Foo App',
                    'All 2 updates installed successfully.',
                ].join('\n')
            );
            expect(response.isError).to.be.undefined;
            expect(seen).to.deep.equal([
                ['started', 1],
                ['succeeded', 2],
                ['started', 3],
                ['succeeded', 4],
                ['summary', 5],
            ]);
        });

        it('should launch nothing when the selection is empty', async function () {
            const service = createService(new FakeLauncher([], [ok(UPGRADES)]));
            const installer = new FakeLauncher();
            const orchestrator = new UpdateOrchestrator({ launcher: installer, sink: new RecordingSink() });

            const response = await installUpdatesHandler(service, orchestrator, { ids: [], categories: ['regular'] });

            expect(installer.launches).to.have.length(0);
            expect(textOf(response)).to.equal('Nothing selected for installation.');
        });

        it('should use the default silent setting when the call does not give one', async function () {
            const service = createService(new FakeLauncher([], [ok(UPGRADES)]));
            const installer = new FakeLauncher();
            const orchestrator = new UpdateOrchestrator({ launcher: installer, sink: new RecordingSink() });

            await installUpdatesHandler(service, orchestrator, { categories: ['unknown'] }, { defaultSilent: true });

            expect(installer.launches.map((launch) => launch.args)).to.deep.equal([['upgrade', '--id', 'Bar.Tool', '--silent']]);
        });

        it('should kill the running install when a progress notification fails', async function () {
            const service = createService(new FakeLauncher([], [ok(UPGRADES)]));
            const installer = new FakeLauncher([{ stdout: ['Downloading installer'], hang: true }]);
            const orchestrator = new UpdateOrchestrator({ launcher: installer, sink: new RecordingSink() });

            const response = await installUpdatesHandler(
                service,
                orchestrator,
                { categories: ['regular'] },
                {
                    onEvent: async (event) => {
                        if (event.type === 'output') throw new Error('transport closed');
                    },
                }
            );

            expect(textOf(response)).to.equal('❌ transport closed');
            expect(response.isError).to.be.true;
            expect(installer.processes[0].killed).to.be.true;
        });

        it('should flag an error when every update fails', async function () {
            const service = createService(new FakeLauncher([], [ok(UPGRADES)]));
            const installer = new FakeLauncher([{ exitCode: 1, stderr: 'Installer hash does not match' }]);
            const orchestrator = new UpdateOrchestrator({ launcher: installer, sink: new RecordingSink() });

            const response = await installUpdatesHandler(service, orchestrator, { categories: ['regular'] });

            expect(response.isError).to.be.true;
            expect(textOf(response).split('\n').slice(-2)).to.deep.equal(['All 1 updates failed:', '- Foo App (Foo.App): Installer hash does not match']);
        });
    });
});
