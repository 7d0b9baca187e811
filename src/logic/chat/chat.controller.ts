import { Body, Controller, Post, Res } from '@nestjs/common';
import { ServerResponse } from 'node:http';
import { VectorStoreService } from '../vector-store/vector-store.service';
import { ChatAnswer, ChatService } from './chat.service';
import { AskDto } from './dto/ask.dto';

@Controller('chat')
export class ChatController {

    constructor(
        private readonly chatService: ChatService,
        private readonly vectorStore: VectorStoreService,
    ) {}

    /** Answers one question; a client that hangs up first cancels the answer and nothing is stored. */
    @Post()
    async chat(@Body() body: AskDto, @Res({ passthrough: true }) res: ServerResponse): Promise<ChatAnswer> {
        const abort = new AbortController();
        const onClose = () => {
            if (!res.writableFinished) abort.abort();
        };
        res.once('close', onClose);
        try {
            const index = await this.vectorStore.open();
            return await this.chatService.ask(index, body.question.trim(), body.history, body.sessionId, abort.signal);
        } finally {
            res.off('close', onClose);
        }
    }
}
