import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    main,
} from './cli';
import {
    makeTempDir,
    MemoryStream,
} from './testing';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

const script = `
const fs = require('fs');
const path = require('path');

module.exports = makefile => {
    makefile.recipe('out_txt', [], ctx => {
        fs.writeFileSync(path.join(__dirname, ctx.target), 'built');
    }, {name: 'out.txt'});
    makefile.recipe('all', ['out.txt'], () => undefined);
    makefile.phony(['all']);
};
`;

@suite('cli')
export class CliTest {
    private dir = '';
    private stream = new MemoryStream();

    async before(): Promise<void> {
        this.dir = await makeTempDir();
        this.stream = new MemoryStream();
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    @test
    async 'warns without a make script'(): Promise<void> {
        assert.strictEqual(await main([], {cwd: this.dir, stream: this.stream}), 1);
        assert.strictEqual(this.stream.text(), 'Warning: no make.js or make.cjs found\n');
    }

    @test
    async 'runs targets of make.js'(): Promise<void> {
        await fs.writeFile(path.join(this.dir, 'make.js'), script);

        assert.strictEqual(await main([], {cwd: this.dir, env: {}, stream: this.stream}), 0);
        assert.strictEqual(await fs.readFile(path.join(this.dir, 'out.txt'), 'utf-8'), 'built');
        assert.strictEqual(this.stream.text(), '[1] out.txt\n[2] all\n');
    }

    @test
    async 'rejects a script exporting something else'(): Promise<void> {
        await fs.writeFile(path.join(this.dir, 'make.cjs'), 'module.exports = 42;\n');
        await assert.rejects(main([], {cwd: this.dir, stream: this.stream}), /must export a Makefile or a function/);
    }
}
