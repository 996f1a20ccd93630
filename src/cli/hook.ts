import { asRecord, asTrimmedString } from '../utils.js';

export type HookInput = {
	transcriptPath?: string;
};

/** Picks the fields we use out of the status-line hook payload. */
export function parseHookInput(text: string): HookInput {
	if (text.trim() === '') {
		return {};
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		return {};
	}
	const record = asRecord(parsed);
	if (record == null) {
		return {};
	}
	return {
		transcriptPath: asTrimmedString(record.transcript_path),
	};
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
	const chunks: string[] = [];
	stream.setEncoding('utf8');
	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
	}
	return chunks.join('');
}
