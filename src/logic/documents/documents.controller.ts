import { BadRequestException, Body, Controller, Post } from '@nestjs/common';
import { normalizeText } from '../../utils/textNormalizer';
import { DocumentsService, IngestSummary } from './documents.service';
import { IngestDto } from './dto/ingest.dto';

@Controller('docs')
export class DocumentsController {
    constructor(private readonly documentsService: DocumentsService) { }

    @Post('ingest')
    async ingest(@Body() body: IngestDto): Promise<IngestSummary> {
        if (!body.paths?.length && !body.folder && !body.documents?.length) {
            throw new BadRequestException('One of paths, folder or documents is required');
        }

        const documents = (body.documents ?? []).map(doc => ({
            filename: doc.filename,
            pages: doc.pages.map((text, page) => ({ page, text: normalizeText(text) })),
        }));
        return this.documentsService.ingest({ paths: body.paths, folder: body.folder, documents }, body.indexDir);
    }
}
