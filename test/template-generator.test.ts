import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
    createInstallFailedMessage,
    createInstallStartedMessage,
    createInstallSucceededMessage,
    createSummaryMessage,
} from '../src/utils/index.js';
import { regularUpdate, unknownUpdate } from './helpers/fakes.js';

describe('Template Generator', function () {
    const foo = regularUpdate({ name: 'Foo App', id: 'Foo.App', version: '1.0', availableVersion: '2.0' });

    it('should name the target version when it is pinned', function () {
        expect(createInstallStartedMessage(foo, 2, 5)).to.equal('Installing Foo App (Foo.App) 2.0 [2/5]');
    });

    it('should say latest when the installed version is unknown', function () {
        const update = unknownUpdate({ name: 'Bar Tool', id: 'Bar.Tool', version: '<Unknown>', availableVersion: '3.1' });

        expect(createInstallStartedMessage(update, 1, 1)).to.equal('Installing Bar Tool (Bar.Tool) latest [1/1]');
    });

    it('should not HTML-escape names or errors', function () {
        const update = regularUpdate({ name: 'Tom & Jerry <Beta>', id: 'Tom.Jerry', version: '1.0', availableVersion: '1.1' });

        expect(createInstallSucceededMessage(update)).to.equal('✅ Installed Tom & Jerry <Beta>');
        expect(createInstallFailedMessage(update, 'exit "1"')).to.equal('❌ Failed to install Tom & Jerry <Beta>: exit "1"');
    });

    it('should list every failure under a partial summary', function () {
        const message = createSummaryMessage('partial', {
            total: 4,
            attempted: 4,
            succeeded: 2,
            failures: [
                { name: 'Foo App', id: 'Foo.App', error: 'Installer hash does not match' },
                { name: 'Bar Tool', id: 'Bar.Tool', error: 'Process exited with code 1' },
            ],
        });

        expect(message).to.equal(
            '2 of 4 updates installed successfully. Failed:\n- Foo App (Foo.App): Installer hash does not match\n- Bar Tool (Bar.Tool): Process exited with code 1'
        );
    });

    it('should report failures before a cancellation', function () {
        const message = createSummaryMessage('cancelled', {
            total: 3,
            attempted: 2,
            succeeded: 1,
            failures: [{ name: 'Foo App', id: 'Foo.App', error: 'Process exited with code 1' }],
        });

        expect(message).to.equal('Installation cancelled after 2 of 3 updates (1 succeeded).\n- Foo App (Foo.App): Process exited with code 1');
    });
});
