import path from 'path';
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { errorMessage, logger } from '@docqa/service-template';
import { Connector, Credentials, RawDocument } from './base';
import { SharePointDownload, convertSharePointUrl, isSharePointUrl } from './sharepoint';
import { CONTENT_TYPE_EXTENSIONS, formatFromExtension } from '../normalizer/formats';
import { CorruptDocument, DownloadFailure } from '../errors';

export type DownloadClient = Pick<AxiosInstance, 'get'>;

export const DOWNLOAD_TIMEOUT_MS = 30000;

const REQUEST_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
    'Accept': '*/*'
};

const FILENAME_PATTERN = /filename[^;=\n]*=((['"]).*?\2|[^\s;]+)/;
const HTML_MARKERS = ['<html', '<asp', '<!doctype'];
const LOGIN_MARKERS = ['<html', '<form', 'sign in', 'login'];
const FALLBACK_NAME = 'document_from_url';

const header = (res: AxiosResponse, name: string): string => {
    const value = res.headers[name];
    return typeof value === 'string' ? value : '';
};

// follow-redirects exposes the URL after redirects on the native response
const finalUrlOf = (res: AxiosResponse, requested: string): string => {
    const responseUrl = res.request?.res?.responseUrl;
    return typeof responseUrl === 'string' ? responseUrl : requested;
};

const pathOf = (url: string): string => {
    try {
        return decodeURIComponent(new URL(url).pathname);
    } catch {
        return '';
    }
};

export const dispositionFilename = (disposition: string): string | undefined => {
    if (!disposition.includes('filename=')) return undefined;
    const match = FILENAME_PATTERN.exec(disposition);
    return match ? match[1].replace(/^['"]+|['"]+$/g, '') : undefined;
};

/**
 * Downloads a single document over HTTP(S), including SharePoint viewer
 * links, and works out its format from the URL and response headers.
 */
export class UrlConnector implements Connector {
    private http: DownloadClient;

    constructor(http?: DownloadClient) {
        this.http = http || axios.create({ timeout: DOWNLOAD_TIMEOUT_MS, maxRedirects: 10 });
    }

    async fetch(url: string, credentials?: Credentials): Promise<RawDocument> {
        const sharePoint: SharePointDownload = isSharePointUrl(url) ? convertSharePointUrl(url) : { downloadUrl: url };
        const { downloadUrl } = sharePoint;

        const request: AxiosRequestConfig = {
            responseType: 'arraybuffer',
            timeout: DOWNLOAD_TIMEOUT_MS,
            headers: { ...REQUEST_HEADERS }
        };
        if (credentials?.type === 'basic') {
            request.auth = { username: credentials.username, password: credentials.password };
        } else if (credentials?.type === 'bearer') {
            request.headers = { ...REQUEST_HEADERS, 'Authorization': `Bearer ${credentials.token}` };
        }

        logger.info(`Downloading document from ${downloadUrl}`, { sharepoint: downloadUrl !== url });

        let res: AxiosResponse<ArrayBuffer>;
        try {
            res = await this.http.get<ArrayBuffer>(downloadUrl, request);
        } catch (err) {
            throw new DownloadFailure(
                `Failed to download file from URL: ${errorMessage(err)}. Please ensure the URL is accessible and points to a downloadable file.`,
                { cause: err }
            );
        }

        const content = Buffer.from(res.data);

        if (credentials && content.length > 0) {
            const preview = content.subarray(0, 1000).toString('utf-8').toLowerCase();
            if (LOGIN_MARKERS.some(marker => preview.includes(marker))) {
                throw new DownloadFailure(
                    'Authentication failed. The server answered with a sign-in page instead of the document. Try a direct download link or upload the file manually.'
                );
            }
        }

        const finalUrl = finalUrlOf(res, downloadUrl);
        const contentType = header(res, 'content-type').split(';')[0].trim();
        const disposedName = dispositionFilename(header(res, 'content-disposition'));
        const extension = this.detectExtension(finalUrl, contentType, disposedName, sharePoint.detectedExtension);

        if (content.length === 0) {
            throw new DownloadFailure(
                'Downloaded file is empty. The URL may require authentication or the file may not be accessible.'
            );
        }

        if (content.length < 1024) {
            const head = content.toString('utf-8').toLowerCase();
            if (HTML_MARKERS.some(marker => head.includes(marker))) {
                throw new DownloadFailure(
                    'Downloaded content appears to be a web page (HTML/ASPX) rather than a document file. This usually means the URL requires authentication. Try a direct download link or upload the file manually.'
                );
            }
        }

        if (extension.toLowerCase() === '.pptx' && content.subarray(0, 2).toString('latin1') !== 'PK') {
            throw new CorruptDocument(
                'Downloaded file does not appear to be a valid PowerPoint file. The file may be corrupted or the URL may not point to the actual file.'
            );
        }

        const format = formatFromExtension(extension);
        const candidates = [disposedName, sharePoint.fileName, path.posix.basename(pathOf(finalUrl))];
        const filename = candidates.find(name => name && path.posix.extname(name).toLowerCase() === extension.toLowerCase())
            || `${FALLBACK_NAME}${extension.toLowerCase()}`;

        return { sourceUri: url, filename, content, format, contentType: contentType || undefined };
    }

    /**
     * Final URL path, then the SharePoint `file` parameter, then the
     * Content-Type, then the Content-Disposition filename. `.aspx` pages
     * say nothing about the document behind them.
     */
    private detectExtension(finalUrl: string, contentType: string, disposedName?: string, detected?: string): string {
        let extension = path.posix.extname(pathOf(finalUrl));

        if (!extension && detected) {
            extension = detected;
        }

        if (!extension || extension.toLowerCase() === '.aspx') {
            const fromContentType = CONTENT_TYPE_EXTENSIONS[contentType];
            if (fromContentType) {
                extension = fromContentType;
            } else if (detected) {
                extension = detected;
            } else if (disposedName) {
                extension = path.posix.extname(disposedName);
            }
        }

        if (!extension || extension.toLowerCase() === '.aspx') {
            if (detected) return detected;
            throw new DownloadFailure(
                'Could not determine file type from URL. Please ensure the URL points directly to a document file (PDF, Word, PowerPoint, or Text).'
            );
        }
        return extension;
    }
}
