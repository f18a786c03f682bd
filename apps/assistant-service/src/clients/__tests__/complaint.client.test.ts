import { createComplaintClient, toCreateComplaintPayload } from '../complaint.client';

function mockFetchOnce(status: number, body: string) {
  return jest
    .spyOn(global, 'fetch')
    .mockResolvedValueOnce(new Response(body, { status, headers: { 'Content-Type': 'application/json' } }));
}

const client = createComplaintClient({ baseUrl: 'http://complaints.test', timeoutMs: 1000 });

const fields = {
  description: 'late delivery',
  name: 'Jane Doe',
  phone: '5551234567',
  email: 'jane@example.com',
};

describe('toCreateComplaintPayload', () => {
  test('maps slot names onto the backend fields', () => {
    expect(toCreateComplaintPayload(fields)).toEqual({
      name: 'Jane Doe',
      phone_number: '5551234567',
      email: 'jane@example.com',
      complaint_details: 'late delivery',
    });
  });

  test('sends unconfigured slots as empty strings', () => {
    expect(toCreateComplaintPayload({ description: 'late delivery' })).toEqual({
      name: '',
      phone_number: '',
      email: '',
      complaint_details: 'late delivery',
    });
  });
});

describe('createComplaintClient', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('submit posts the complaint and returns its id', async () => {
    const spy = mockFetchOnce(201, JSON.stringify({ complaint_id: 'CMP-1001' }));

    await expect(client.submit(fields, 'req-1')).resolves.toEqual({ type: 'submitted', complaintId: 'CMP-1001' });

    const [url, init] = spy.mock.calls[0];
    expect(url).toBe('http://complaints.test/api/complaints');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(
      '{"name":"Jane Doe","phone_number":"5551234567","email":"jane@example.com","complaint_details":"late delivery"}',
    );
  });

  test('submit accepts an id field', async () => {
    mockFetchOnce(201, JSON.stringify({ id: '65f0c0ffee' }));

    await expect(client.submit(fields)).resolves.toEqual({ type: 'submitted', complaintId: '65f0c0ffee' });
  });

  test('submit reports a response without an id as a failure', async () => {
    mockFetchOnce(201, JSON.stringify({ ok: true }));

    await expect(client.submit(fields)).resolves.toEqual({
      type: 'failure',
      message: 'complaint service returned no complaint id',
    });
  });

  test('submit reports server errors as failures', async () => {
    mockFetchOnce(503, JSON.stringify({ detail: 'down' }));

    await expect(client.submit(fields)).resolves.toEqual({ type: 'failure', message: 'complaint service responded 503' });
  });

  test('fetch returns the record', async () => {
    const spy = mockFetchOnce(200, JSON.stringify({ complaint_id: 'CMP-1001', name: 'Jane Doe' }));

    await expect(client.fetch('CMP-1001')).resolves.toEqual({
      type: 'found',
      record: { complaint_id: 'CMP-1001', name: 'Jane Doe' },
    });
    expect(spy.mock.calls[0][0]).toBe('http://complaints.test/api/complaints/CMP-1001');
  });

  test('fetch maps 404 to not found', async () => {
    mockFetchOnce(404, JSON.stringify({ detail: 'Complaint not found' }));

    await expect(client.fetch('CMP-0000')).resolves.toEqual({ type: 'not_found', id: 'CMP-0000' });
  });

  test('fetch reports network errors as failures', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(client.fetch('CMP-1001')).resolves.toEqual({ type: 'failure', message: 'fetch failed' });
  });
});
