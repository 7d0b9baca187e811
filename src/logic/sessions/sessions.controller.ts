import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CreateSessionDto, HistoryQueryDto, RecordMessageDto } from './dto/sessions.dto';
import { SessionsService } from './sessions.service';
import { SessionSummary, StoreStats, StoredMessage } from './types';

@Controller('sessions')
export class SessionsController {
    constructor(private readonly sessionsService: SessionsService) {}

    @Post()
    async create(@Body() body: CreateSessionDto): Promise<{ id: number }> {
        return { id: await this.sessionsService.newSession(body.title) };
    }

    @Get()
    async list(): Promise<SessionSummary[]> {
        return this.sessionsService.listSessions();
    }

    @Get('stats')
    async stats(): Promise<StoreStats> {
        return this.sessionsService.stats();
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
        await this.sessionsService.deleteSession(id);
    }

    @Get(':id/messages')
    async history(@Param('id', ParseIntPipe) id: number, @Query() query: HistoryQueryDto): Promise<StoredMessage[]> {
        await this.sessionsService.getSessionOrThrow(id);
        return this.sessionsService.loadHistory(id, query.limit);
    }

    @Post(':id/messages')
    async record(@Param('id', ParseIntPipe) id: number, @Body() body: RecordMessageDto): Promise<StoredMessage> {
        const sources = body.sources?.map(s => ({ source: s.source, page: s.page, excerpt: s.excerpt }));
        return this.sessionsService.recordTurn(id, body.role, body.content, sources);
    }
}
