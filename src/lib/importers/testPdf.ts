const escapeText = (line: string) => line.replace(/[\\()]/g, c => `\\${c}`);

// Single-page PDF with one Helvetica text line per entry (Latin-1 characters only)
export function buildTextPdf(lines: readonly string[]): Uint8Array {
    const content = [
        'BT',
        '/F1 10 Tf',
        '14 TL',
        '50 800 Td',
        ...lines.map(line => `(${escapeText(line)}) Tj T*`),
        'ET',
    ].join('\n');

    const objects = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
        '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 595 842] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
        `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    ];

    let pdf = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((body, i) => {
        offsets.push(pdf.length);
        pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
    });
    const xref = pdf.length;
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    pdf += offsets.map(offset => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`;

    // Latin-1: one byte per character, so string offsets are byte offsets
    return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

export const ETF_BUY_LINES = [
    'Wertpapierabrechnung Kauf',
    'Nominale Wertpapierbezeichnung ISIN (WKN)',
    'Stück 12,5 WORLD EQUITY ETF REGISTERED SHARES IE0000000001 (A0RPWH)',
    'Handels-/Ausführungsplatz XETRA',
    'Schlusstag/-Zeit 05.03.2021 09:04:12',
    'Ausführungskurs 1.234,56 EUR',
];
