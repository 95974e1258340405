import { Document, Packer, Paragraph, TextRun } from "docx";

/** Word document with one paragraph per line of text */
export async function textToDocx(text: string): Promise<Buffer> {
    const document = new Document({
        sections: [
            {
                children: text.split("\n").map(
                    (line) => new Paragraph({ children: [new TextRun(line)] })
                ),
            },
        ],
    });

    return Packer.toBuffer(document);
}
