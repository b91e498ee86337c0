import type { ControlDescriptor } from '../browser/page_driver';

/** The rendered PDF preview; present once compilation output is on screen. */
export const PDF_VIEWER: ControlDescriptor = {
  name: 'pdf viewer',
  selectors: [
    "//div[@class='canvasWrapper']",
    '.pdfjs-viewer-inner .page canvas',
    '.pdf-viewer .canvasWrapper',
  ],
};

export const DOWNLOAD_PDF_BUTTON: ControlDescriptor = {
  name: 'download pdf button',
  selectors: [
    "//i[contains(@class, 'fa-download')]",
    'a[aria-label="Download PDF"]',
    'button[aria-label="Download PDF"]',
    'a[href*="/output/output.pdf"]',
  ],
};
