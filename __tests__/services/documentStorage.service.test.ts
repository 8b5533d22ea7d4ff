import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import {
  discrepancyReportPath,
  S3BlobStore,
  statusChangeLogPath,
  timesheetArchivePath,
  XLSX_CONTENT_TYPE,
} from '../../src/services/documentStorage.service';

describe('S3BlobStore', () => {
  const makeClient = (send: jest.Mock): S3Client => {
    const client = new S3Client({ region: 'us-east-1' });
    client.send = send;
    return client;
  };

  it('should upload the object and return its s3 reference', async () => {
    const send = jest.fn().mockResolvedValue({});
    const store = new S3BlobStore(makeClient(send), 'test-bucket');
    const body = Buffer.from('xlsx-bytes');

    const reference = await store.put('Timesheet/2025/03/a.xlsx', body, XLSX_CONTENT_TYPE);

    expect(reference).toBe('s3://test-bucket/Timesheet/2025/03/a.xlsx');
    expect(send).toHaveBeenCalledTimes(1);
    const command: unknown = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    if (command instanceof PutObjectCommand) {
      expect(command.input).toEqual({
        Bucket: 'test-bucket',
        Key: 'Timesheet/2025/03/a.xlsx',
        Body: body,
        ContentLength: body.length,
        ContentType: XLSX_CONTENT_TYPE,
      });
    }
  });

  it('should wrap upload failures with the object path', async () => {
    const send = jest.fn().mockRejectedValue(new Error('AccessDenied'));
    const store = new S3BlobStore(makeClient(send), 'test-bucket');

    await expect(store.put('JSON_Logs/x.json', Buffer.from('{}'), 'application/json')).rejects.toThrow(
      'Upload of JSON_Logs/x.json failed: AccessDenied'
    );
  });
});

describe('storage paths', () => {
  const at = new Date(2025, 2, 14, 10, 15, 0);

  it('should partition archived timesheets by month', () => {
    expect(timesheetArchivePath('march.xlsx', at)).toBe('Timesheet/2025/03/20250314-101500_march.xlsx');
  });

  it('should strip directories from client file names', () => {
    expect(timesheetArchivePath('C:\\Users\\ops\\march.xlsx', at)).toBe(
      'Timesheet/2025/03/20250314-101500_march.xlsx'
    );
    expect(timesheetArchivePath('../../etc/passwd', at)).toBe('Timesheet/2025/03/20250314-101500_passwd');
  });

  it('should name discrepancy reports after the source file', () => {
    expect(discrepancyReportPath('march.xlsx', at)).toBe(
      'Timesheet/Discrepancy Reports/2025/03/discrepancy_march_20250314-101500.xlsx'
    );
  });

  it('should place status change logs under the audit prefix', () => {
    expect(statusChangeLogPath('INV-1', at)).toBe('JSON_Logs/2025/03/invoice_INV-1_status_change.json');
  });
});
