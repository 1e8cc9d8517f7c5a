import { HttpDocumentEditor } from '../../src/collaborators/http-document-editor';
import { rejectionCode } from '../helpers/fakes';

const INSERTIONS = [{ section: 'Experience', content: 'Operated Kubernetes clusters.' }];

function createEditor(reply: () => Promise<Response>) {
  const fetchFn = jest.fn<Promise<Response>, [string, RequestInit?]>(reply);
  const editor = new HttpDocumentEditor({ baseUrl: 'http://editor.test', apiKey: 'test-key', fetchFn });
  return { editor, fetchFn };
}

describe('HttpDocumentEditor', () => {
  test('posts insertions with the idempotency key', async () => {
    const { editor, fetchFn } = createEditor(async () => new Response(JSON.stringify({ applied: 1, editRef: 'rev-7' })));

    const result = await editor.applyEdits('cv/resume.md', INSERTIONS, 'run_1:finalizing:apply_edits');

    expect(result).toEqual({ applied: 1, editRef: 'rev-7' });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('http://editor.test/documents/cv%2Fresume.md/insertions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
      'Idempotency-Key': 'run_1:finalizing:apply_edits',
    });
    expect(init?.body).toBe(JSON.stringify({ insertions: INSERTIONS }));
  });

  test('maps a missing document to SOURCE.NOT_FOUND', async () => {
    const { editor } = createEditor(async () => new Response('', { status: 404 }));
    expect(await rejectionCode(editor.applyEdits('resume.md', INSERTIONS, 'k'))).toBe('SOURCE.NOT_FOUND');
  });

  test('rejects an invalid response body', async () => {
    const { editor } = createEditor(async () => new Response(JSON.stringify({ applied: -1 })));
    expect(await rejectionCode(editor.applyEdits('resume.md', INSERTIONS, 'k'))).toBe('UPSTREAM.UNAVAILABLE');
  });

  test('maps conflicts to UPSTREAM.REJECTED', async () => {
    const { editor } = createEditor(async () => new Response('', { status: 409 }));
    expect(await rejectionCode(editor.applyEdits('resume.md', INSERTIONS, 'k'))).toBe('UPSTREAM.REJECTED');
  });
});
