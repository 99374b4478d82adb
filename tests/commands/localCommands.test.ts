import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, afterEach } from 'mocha';
import { runExpand } from '../../src/commands/expand';
import { runRender } from '../../src/commands/render';
import { FeedClientError } from '../../src/client/errors';
import { Entity, entity, repeated, scalar } from '../../src/entity/entity_types';
import { StringSink } from '../../src/render/XmlRenderer';

describe('Offline commands', () => {
    afterEach(() => {
        sinon.restore();
    });

    describe('runExpand', () => {
        it('should write the loaded document unchanged', () => {
            const out = new StringSink();
            const loadFn = sinon.stub<[string], string>().returns('<entity><body>&lt;p&gt;</body></entity>\n');

            const content = runExpand('entry.xml', out, loadFn);

            expect(loadFn.calledOnceWithExactly('entry.xml')).to.be.true;
            expect(content).to.equal('<entity><body>&lt;p&gt;</body></entity>\n');
            expect(out.toString()).to.equal(content);
        });
    });

    describe('runRender', () => {
        it('should print the parsed entity in display form', () => {
            const out = new StringSink();
            const loadFn = () => '<entity><tags repeatable="true">a</tags><tags>b</tags><title>T</title></entity>';

            const result = runRender('entry.xml', out, loadFn);

            expect(result).to.deep.equal(entity({ tags: repeated([scalar('a'), scalar('b')]), title: scalar('T') }));
            expect(out.toString()).to.equal(
                '<entity>\n' +
                '  <tags repeatable="true">a</tags>\n' +
                '  <tags>b</tags>\n' +
                '  <title>T</title>\n' +
                '</entity>\n'
            );
        });

        it('should use the injected parser', () => {
            const out = new StringSink();
            const parseFn = sinon.stub<[string], Entity>().returns(entity({ a: scalar('1') }));

            runRender('entry.xml', out, () => '<anything/>', parseFn);

            expect(parseFn.calledOnceWithExactly('<anything/>')).to.be.true;
            expect(out.toString()).to.equal('<entity>\n  <a>1</a>\n</entity>\n');
        });

        it('should propagate parse failures', () => {
            const out = new StringSink();

            expect(() => runRender('entry.xml', out, () => '<entry/>'))
                .to.throw(FeedClientError, 'Expected <entity> root element, found <entry>');
            expect(out.toString()).to.equal('');
        });
    });
});
