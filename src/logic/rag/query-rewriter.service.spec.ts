import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { loadRagConfig } from '../../config/configuration';
import { ScriptedGenerator } from '../../testing/fake-providers';
import { OperationAbortedError } from '../../utils/errors';
import { ChatTurn, GENERATION_PROVIDER } from '../providers/types';
import { CONTEXTUALIZE_SYSTEM } from './prompts';
import { QueryRewriterService, cleanRewrite } from './query-rewriter.service';

const HAMLET_HISTORY: ChatTurn[] = [
    { role: 'user', content: 'Who wrote Hamlet?' },
    { role: 'assistant', content: 'Hamlet was written by William Shakespeare.' },
];

describe('QueryRewriterService', () => {
    async function createRewriter(generator: ScriptedGenerator): Promise<QueryRewriterService> {
        const module: TestingModule = await Test.createTestingModule({
            providers: [
                QueryRewriterService,
                { provide: GENERATION_PROVIDER, useValue: generator },
                { provide: ConfigService, useValue: new ConfigService({ rag: loadRagConfig({}) }) },
            ],
        }).compile();
        return module.get<QueryRewriterService>(QueryRewriterService);
    }

    it('returns the question untouched when there is no history', async () => {
        const generator = new ScriptedGenerator([]);
        const rewriter = await createRewriter(generator);

        await expect(rewriter.rewrite([], 'What is RAG?')).resolves.toBe('What is RAG?');
        expect(generator.requests).toEqual([]);
    });

    it('resolves a pronoun against the conversation', async () => {
        const generator = new ScriptedGenerator([
            req => (req.history.some(t => t.content.includes('Shakespeare')) ? 'When was William Shakespeare born?' : req.user),
        ]);
        const rewriter = await createRewriter(generator);

        const standalone = await rewriter.rewrite(HAMLET_HISTORY, 'When was he born?');

        expect(standalone).toBe('When was William Shakespeare born?');
        expect(standalone).not.toMatch(/\bhe\b/);
        expect(generator.requests).toEqual([
            { system: CONTEXTUALIZE_SYSTEM, history: HAMLET_HISTORY, user: 'When was he born?', temperature: 0 },
        ]);
    });

    it('only shows the provider the most recent turns', async () => {
        const generator = new ScriptedGenerator(['Which turn came last?']);
        const rewriter = await createRewriter(generator);
        const history = Array.from({ length: 8 }, (_, i): ChatTurn => ({
            role: i % 2 ? 'assistant' : 'user',
            content: `turn ${i}`,
        }));

        await rewriter.rewrite(history, 'and then?');

        expect(generator.requests[0].history.map(t => t.content)).toEqual(['turn 3', 'turn 4', 'turn 5', 'turn 6', 'turn 7']);
    });

    it('strips a label and quotes around the rewritten question', async () => {
        const rewriter = await createRewriter(new ScriptedGenerator(['  Standalone question: "When was Shakespeare born?"\n']));

        await expect(rewriter.rewrite(HAMLET_HISTORY, 'When was he born?')).resolves.toBe('When was Shakespeare born?');
    });

    it.each(['', '   ', '"..."', 'Question:'])('falls back to the question when the provider returns %j', async reply => {
        const rewriter = await createRewriter(new ScriptedGenerator([reply]));

        await expect(rewriter.rewrite(HAMLET_HISTORY, 'When was he born?')).resolves.toBe('When was he born?');
    });

    it('wraps provider failures', async () => {
        const rewriter = await createRewriter(
            new ScriptedGenerator([
                () => {
                    throw new Error('model offline');
                },
            ]),
        );

        await expect(rewriter.rewrite(HAMLET_HISTORY, 'When was he born?')).rejects.toMatchObject({
            name: 'GenerationError',
            message: 'rewriting failed: model offline',
        });
    });

    it('does not call the provider once the caller has aborted', async () => {
        const generator = new ScriptedGenerator(['unused']);
        const rewriter = await createRewriter(generator);
        const controller = new AbortController();
        controller.abort();

        await expect(rewriter.rewrite(HAMLET_HISTORY, 'When was he born?', controller.signal)).rejects.toBeInstanceOf(
            OperationAbortedError,
        );
        expect(generator.requests).toEqual([]);
    });
});

describe('cleanRewrite', () => {
    it('keeps text that only looks like it has quotes inside', () => {
        expect(cleanRewrite('What does "grounding" mean?')).toBe('What does "grounding" mean?');
    });

    it('keeps a quote that ends the question', () => {
        expect(cleanRewrite('Define "grounding"')).toBe('Define "grounding"');
        expect(cleanRewrite("Who wrote 'Hamlet'")).toBe("Who wrote 'Hamlet'");
    });

    it('strips only matching quote pairs around the whole question', () => {
        expect(cleanRewrite('“Define "grounding"”')).toBe('Define "grounding"');
        expect(cleanRewrite('"\'Who wrote Hamlet?\'"')).toBe('Who wrote Hamlet?');
        expect(cleanRewrite('"Who wrote Hamlet?’')).toBe('"Who wrote Hamlet?’');
    });

    it('accepts non-Latin letters', () => {
        expect(cleanRewrite('「東京」')).toBe('「東京」');
    });
});
