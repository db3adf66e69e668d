import { convertSharePointUrl, isSharePointUrl } from './sharepoint';

describe('SharePoint links', () => {
    it('should recognise SharePoint hosts', () => {
        expect(isSharePointUrl('https://Contoso.SharePoint.com/sites/team')).toBe(true);
        expect(isSharePointUrl('https://files.example.com/report.pdf')).toBe(false);
    });

    it('should rewrite a Doc.aspx viewer link to download.aspx', () => {
        const url = 'https://contoso.sharepoint.com/sites/team/_layouts/15/Doc.aspx?sourcedoc=%7B1234%7D&file=Plan.pptx&action=default';

        expect(convertSharePointUrl(url)).toEqual({
            downloadUrl: `https://contoso.sharepoint.com/sites/team/_layouts/15/download.aspx?SourceUrl=${encodeURIComponent(url)}`,
            detectedExtension: '.pptx',
            fileName: 'Plan.pptx'
        });
    });

    it('should point other links with a file parameter at the file under the site', () => {
        const url = 'https://contoso.sharepoint.com/sites/team/_layouts/15/viewer.aspx?file=Q3%20Budget.docx';

        expect(convertSharePointUrl(url)).toEqual({
            downloadUrl: 'https://contoso.sharepoint.com/sites/team/Q3%20Budget.docx',
            detectedExtension: '.docx',
            fileName: 'Q3 Budget.docx'
        });
    });

    it('should leave other links alone', () => {
        const direct = 'https://contoso.sharepoint.com/sites/team/Shared%20Documents/plan.pdf';

        expect(convertSharePointUrl(direct)).toEqual({ downloadUrl: direct });
        expect(convertSharePointUrl('not a url')).toEqual({ downloadUrl: 'not a url' });
    });
});
