import type { FastifyRequest } from 'fastify';
import type { PhotoModel } from '../models/photo.model.js';
import type { PhotoPayload } from '../types/models.js';
import { ValidationError } from '../utils/errors.js';
import type { BlobSink } from './blob.storage.js';
import { analyzeImage } from './image.analysis.js';
import { decodeImage, encodeForUpload } from './image.processing.js';

export interface UploadFile {
    filename: string;
    mimetype: string;
    data: Buffer;
}

// raw multipart input, nothing validated yet
export interface UploadForm {
    file: UploadFile | null;
    title?: string;
    caption?: string;
    location?: string;
    people?: string;
}

export interface UploadResult {
    photo: PhotoPayload;
    storage_name: string;
    original_size: number;
    stored_size: number;
}

const FILE_FIELD = 'photo';
const TEXT_FIELDS = ['title', 'caption', 'location', 'people'] as const;
type TextField = typeof TEXT_FIELDS[number];

function isTextField(name: string): name is TextField {
    return (TEXT_FIELDS as readonly string[]).includes(name);
}

/**============================================
 *          MULTIPART FORM PARSING
 *=============================================**/

export async function readUploadForm(request: FastifyRequest): Promise<UploadForm> {
    const form: UploadForm = { file: null };

    // urlencoded or empty bodies carry no file: let the pipeline report it
    if (!request.isMultipart()) return form;

    for await (const part of request.parts()) {
        if (part.type === 'file') {
            // drain every file part, or the iterator stalls
            const data = await part.toBuffer();
            // an empty file input still sends a part with no filename
            if (part.fieldname === FILE_FIELD && part.filename && form.file === null) {
                form.file = { filename: part.filename, mimetype: part.mimetype, data };
            }
            continue;
        }
        if (isTextField(part.fieldname) && typeof part.value === 'string') {
            form[part.fieldname] = part.value;
        }
    }
    return form;
}

/**============================================
 *             STORAGE NAMING
 *=============================================**/

// ascii-only, no path separators, safe on any filesystem
export function secureFilename(filename: string): string {
    const ascii = filename
        .normalize('NFKD')
        .replace(/[^\x00-\x7F]/g, '')
        .replace(/[/\\]/g, ' ');

    const name = ascii
        .trim()
        .split(/\s+/)
        .join('_')
        .replace(/[^A-Za-z0-9_.-]/g, '')
        .replace(/^[._]+|[._]+$/g, '');

    return name || 'upload';
}

// YYYYMMDDHHMMSS in UTC
export function uploadTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace(/[-:T]/g, '');
}

export function storageName(filename: string, date: Date): string {
    return `${uploadTimestamp(date)}_${secureFilename(filename)}`;
}

function optionalText(value: string | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

/**========================================================================
 **                           UPLOAD PIPELINE
 *? validate -> decode -> characterize -> resize/re-encode -> name
 *? -> write blob -> insert photo row
 *? a failed insert after the blob write leaves an orphaned blob
 *========================================================================**/

export class PhotoUploadService {
    constructor(
        private photoModel: PhotoModel,
        private sink: BlobSink,
        private now: () => Date = () => new Date()
    ) {}

    async upload(user_id: number, form: UploadForm): Promise<UploadResult> {
        const title = optionalText(form.title);
        if (!form.file || form.file.data.length === 0 || !title) {
            throw new ValidationError('Missing fields: a photo file and a title are required');
        }

        const image = await decodeImage(form.file.data);
        const auto_tags = analyzeImage(image);
        const encoded = await encodeForUpload(form.file.data);

        const uploaded_at = this.now();
        const name = storageName(form.file.filename, uploaded_at);
        const file_url = await this.sink.write(name, encoded, 'image/jpeg');

        const created = await this.photoModel.create({
            user_id,
            file_url,
            title,
            caption: optionalText(form.caption),
            location: optionalText(form.location),
            people_present: optionalText(form.people),
            auto_tags,
            uploaded_at,
        });

        const photo = await this.photoModel.findById(created.id);
        if (!photo) {
            throw new Error(`Photo ${created.id} missing right after insert`);
        }

        return {
            photo,
            storage_name: name,
            original_size: form.file.data.length,
            stored_size: encoded.length,
        };
    }
}
