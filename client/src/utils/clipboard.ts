export class ClipboardError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ClipboardError';
    }
}

/**
 * Copies through a temporary, invisible textarea and `execCommand('copy')`.
 * navigator.clipboard is often blocked inside iframes, this path is not.
 */
export function copyText(text: string, doc: Document = document): void {
    const textArea = doc.createElement('textarea');
    textArea.value = text;
    textArea.setAttribute('readonly', '');
    Object.assign(textArea.style, {
        position: 'fixed',
        top: '0',
        left: '0',
        width: '2em',
        height: '2em',
        padding: '0',
        border: 'none',
        outline: 'none',
        boxShadow: 'none',
        background: 'transparent',
    });
    doc.body.appendChild(textArea);

    let copied = false;
    try {
        textArea.focus();
        textArea.select();
        copied = doc.execCommand('copy');
    } catch (err) {
        throw new ClipboardError('Copy command failed', { cause: err });
    } finally {
        textArea.remove();
    }
    if (!copied) throw new ClipboardError('Copy command was rejected');
}
