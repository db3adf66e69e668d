import path from 'path';

export interface SharePointDownload {
    downloadUrl: string;
    /** Extension of the `file` query parameter, e.g. `.pptx`. */
    detectedExtension?: string;
    fileName?: string;
}

export const isSharePointUrl = (url: string): boolean => url.toLowerCase().includes('sharepoint.com');

/**
 * Rewrite a SharePoint viewer link into something that returns the file's
 * bytes. Links that cannot be parsed come back unchanged.
 */
export const convertSharePointUrl = (url: string): SharePointDownload => {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return { downloadUrl: url };
    }

    const fileName = parsed.searchParams.get('file') || undefined;
    const detectedExtension = fileName ? path.posix.extname(fileName) || undefined : undefined;
    const sitePath = parsed.pathname.split('/_layouts')[0];
    const origin = `${parsed.protocol}//${parsed.host}`;

    if (parsed.pathname.includes('/Doc.aspx')) {
        return {
            downloadUrl: `${origin}${sitePath}/_layouts/15/download.aspx?SourceUrl=${encodeURIComponent(url)}`,
            detectedExtension,
            fileName
        };
    }

    if (fileName) {
        return {
            downloadUrl: `${origin}${sitePath}/${encodeURIComponent(fileName)}`,
            detectedExtension,
            fileName
        };
    }

    return { downloadUrl: url };
};
