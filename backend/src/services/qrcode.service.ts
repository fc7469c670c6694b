import QRCode from 'qrcode';

const QR_OPTIONS = {
    errorCorrectionLevel: 'M',
    margin: 2,
    width: 300,
} as const;

// data:image/png;base64,... stored next to a transformation
export function toQrDataUri(text: string): Promise<string> {
    return QRCode.toDataURL(text, QR_OPTIONS);
}

export function toQrPng(text: string): Promise<Buffer> {
    return QRCode.toBuffer(text, { ...QR_OPTIONS, type: 'png' });
}
