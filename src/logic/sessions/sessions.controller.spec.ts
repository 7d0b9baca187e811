import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import path from 'path';
import { DataSource } from 'typeorm';
import { Message, Session } from '../../entities';
import { makeTempDir, openTestDatabase, removeDir } from '../../testing/database';
import { UnknownSessionError } from '../../utils/errors';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

describe('SessionsController', () => {
    let dir: string;
    let dataSource: DataSource;
    let controller: SessionsController;

    beforeEach(async () => {
        dir = makeTempDir('sessions-controller');
        dataSource = await openTestDatabase(path.join(dir, 'chat.db'));
        const module: TestingModule = await Test.createTestingModule({
            controllers: [SessionsController],
            providers: [
                SessionsService,
                { provide: DataSource, useValue: dataSource },
                { provide: getRepositoryToken(Session), useValue: dataSource.getRepository(Session) },
                { provide: getRepositoryToken(Message), useValue: dataSource.getRepository(Message) },
            ],
        }).compile();

        controller = module.get<SessionsController>(SessionsController);
    });

    afterEach(async () => {
        await dataSource.destroy();
        removeDir(dir);
    });

    it('should be defined', () => {
        expect(controller).toBeDefined();
    });

    it('creates, lists and deletes sessions', async () => {
        const { id } = await controller.create({});
        const named = await controller.create({ title: 'Research' });

        expect((await controller.list()).map(s => s.title)).toEqual(['Research', 'Chat 1']);

        await controller.remove(id);
        expect((await controller.list()).map(s => s.id)).toEqual([named.id]);
    });

    it('keeps one session after the last is deleted', async () => {
        const { id } = await controller.create({ title: 'Scratch' });

        await controller.remove(id);

        const sessions = await controller.list();
        expect(sessions.map(s => s.title)).toEqual(['Chat 1']);
        expect(sessions[0].id).not.toBe(id);
    });

    it('records messages with their sources and replays them', async () => {
        const { id } = await controller.create({ title: 'Notes' });
        await controller.record(id, { role: 'user', content: 'What is chunking?' });
        await controller.record(id, {
            role: 'assistant',
            content: 'Splitting text into windows.',
            sources: [{ source: 'rag.md', page: null, excerpt: 'Chunking splits text.' }],
        });

        const latest = await controller.history(id, { limit: 1 });

        expect(latest.map(m => [m.role, m.metadata])).toEqual([
            ['assistant', { kind: 'source_citations', sources: [{ source: 'rag.md', page: null, excerpt: 'Chunking splits text.' }] }],
        ]);
        expect((await controller.stats()).totalMessages).toBe(2);
    });

    it('reports history of an unknown session as missing', async () => {
        await expect(controller.history(77, {})).rejects.toBeInstanceOf(UnknownSessionError);
    });
});
