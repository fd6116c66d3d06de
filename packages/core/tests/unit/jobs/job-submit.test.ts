import { describe, expect, it } from 'vitest';
import { JobSubmit, toDatasetReference } from '../../../src/jobs/job-submit.js';
import { ZosmfRestClient } from '../../../src/rest/zosmf-rest-client.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createLogger } from '../../../src/utils/logger.js';
import { JOB_DOCUMENT } from '../../support/job-documents.js';
import { StubExecutor, TEST_AUTH, TEST_CONNECTION } from '../../support/stub-executor.js';

const JCL = '//PAYROLL JOB (ACCT),CLASS=A\n//STEP1 EXEC PGM=IEFBR14\n';

function setup() {
  const executor = new StubExecutor();
  const submit = new JobSubmit(new ZosmfRestClient(TEST_CONNECTION, executor));
  return { executor, submit };
}

describe('toDatasetReference', () => {
  it('wraps a bare data set name', () => {
    expect(toDatasetReference('IBMUSER.JCL(PAYROLL)')).toBe("//'IBMUSER.JCL(PAYROLL)'");
  });

  it('does not double-quote a quoted name', () => {
    expect(toDatasetReference(" 'IBMUSER.JCL(PAYROLL)' ")).toBe("//'IBMUSER.JCL(PAYROLL)'");
  });

  it('rejects a blank name', () => {
    expect(() => toDatasetReference('')).toThrow('dataset not specified');
  });
});

describe('JobSubmit.submitJcl', () => {
  it('puts the JCL through the internal reader', async () => {
    const { executor, submit } = setup();
    executor.respond(201, { ...JOB_DOCUMENT, status: 'INPUT', retcode: null }, 'Created');

    const job = await submit.submitJcl(JCL, { jclSymbols: { HLQ: 'IBMUSER' } });

    expect(job).toMatchObject({ jobName: 'PAYROLL', jobId: 'JOB01234', status: 'INPUT', retCode: null });
    expect(executor.lastRequest).toEqual({
      method: 'PUT',
      url: 'https://zos.example.test:10443/zosmf/restjobs/jobs',
      headers: {
        Authorization: TEST_AUTH,
        'X-CSRF-ZOSMF-HEADER': 'true',
        'Content-Type': 'text/plain',
        'X-IBM-Intrdr-Class': 'A',
        'X-IBM-Intrdr-Mode': 'TEXT',
        'X-IBM-Intrdr-Recfm': 'F',
        'X-IBM-Intrdr-Lrecl': '80',
        'X-IBM-JCL-Symbol-HLQ': 'IBMUSER',
      },
      body: JCL,
      signal: undefined,
    });
  });

  it('honours the internal reader record format', async () => {
    const { executor, submit } = setup();
    executor.respond(201, JOB_DOCUMENT);

    await submit.submitJcl(JCL, { internalReaderRecfm: 'V', internalReaderLrecl: 255 });

    expect(executor.lastRequest?.headers).toMatchObject({ 'X-IBM-Intrdr-Recfm': 'V', 'X-IBM-Intrdr-Lrecl': '255' });
  });

  it('rejects an out-of-range record length before sending', async () => {
    const { executor, submit } = setup();

    await expect(submit.submitJcl(JCL, { internalReaderLrecl: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(executor.requests).toHaveLength(0);
  });

  it('rejects empty JCL', async () => {
    const { submit } = setup();
    await expect(submit.submitJcl('  ')).rejects.toThrow('jcl not specified');
  });

  it('logs the submitted job', async () => {
    const lines: string[] = [];
    const executor = new StubExecutor().respond(201, JOB_DOCUMENT);
    const logger = createLogger('info', { scope: 'submit', sink: (line) => lines.push(line) });
    const submit = new JobSubmit(new ZosmfRestClient(TEST_CONNECTION, executor), logger);

    await submit.submitJcl(JCL);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[.+\] INFO \[submit\]: Submitted PAYROLL\(JOB01234\)$/);
  });
});

describe('JobSubmit.submitDataset', () => {
  it('sends the data set reference as JSON', async () => {
    const { executor, submit } = setup();
    executor.respond(201, JOB_DOCUMENT);

    const job = await submit.submitDataset('IBMUSER.JCL(PAYROLL)', { jclSymbols: { DAY: 'MON' } });

    expect(job.jobId).toBe('JOB01234');
    expect(executor.lastRequest).toMatchObject({
      method: 'PUT',
      url: 'https://zos.example.test:10443/zosmf/restjobs/jobs',
      body: `{"file":"//'IBMUSER.JCL(PAYROLL)'"}`,
      headers: {
        'Content-Type': 'application/json',
        'X-IBM-JCL-Symbol-DAY': 'MON',
      },
    });
  });
});
