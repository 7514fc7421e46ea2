import fs from 'fs';
import os from 'os';
import path from 'path';
import { CsvLogonSource, CsvMailboxSource, parseCsv } from '../sources';
import { mergeSignIn } from '../signin';
import { SourceError } from '../../utils/errors';
import { NOW } from '../../__tests__/helpers/fixtures';

describe('parseCsv', () => {
  it('skips the Export-Csv type line and lower-cases column names', () => {
    const records = parseCsv(
      '#TYPE Selected.Microsoft.ActiveDirectory.Management.ADUser\n"UserPrincipalName","LastLogonDate"\n"a@contoso.test","2024-01-01"\n',
      'users.csv'
    );

    expect(records).toHaveLength(1);
    expect(Array.from(records[0].entries())).toEqual([
      ['userprincipalname', 'a@contoso.test'],
      ['lastlogondate', '2024-01-01'],
    ]);
  });

  it('wraps parser failures in a SourceError', () => {
    expect(() => parseCsv('"a","b"\n"1","2","3"\n', 'bad.csv')).toThrow(SourceError);
  });
});

describe('CSV sources', () => {
  let dir: string;

  const writeFile = (name: string, content: string): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'license-sources-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('CsvMailboxSource', () => {
    it('reads an Exchange Online mailbox export', async () => {
      const filePath = writeFile(
        'mailboxes.csv',
        [
          '#TYPE Deserialized.Microsoft.Exchange.Data.Directory.Management.Mailbox',
          '"DisplayName","UserPrincipalName","PrimarySmtpAddress","RecipientTypeDetails"',
          '"Front Desk","frontdesk@contoso.test","reception@contoso.test","SharedMailbox"',
          '"Room 1","room1@contoso.test","","RoomMailbox"',
          '',
        ].join('\n')
      );

      const mailboxes = await new CsvMailboxSource(filePath).listMailboxes();

      expect(mailboxes).toEqual([
        {
          displayName: 'Front Desk',
          userPrincipalName: 'frontdesk@contoso.test',
          primarySmtpAddress: 'reception@contoso.test',
          recipientTypeDetails: 'SharedMailbox',
        },
        {
          displayName: 'Room 1',
          userPrincipalName: 'room1@contoso.test',
          primarySmtpAddress: null,
          recipientTypeDetails: 'RoomMailbox',
        },
      ]);
    });

    it('rejects an export without RecipientTypeDetails', async () => {
      const filePath = writeFile('mailboxes.csv', 'UserPrincipalName,DisplayName\na@contoso.test,A\n');

      await expect(new CsvMailboxSource(filePath).listMailboxes()).rejects.toThrow(
        `Missing column RecipientTypeDetails: ${filePath}`
      );
    });

    it('rejects a missing file', async () => {
      const filePath = path.join(dir, 'missing.csv');

      await expect(new CsvMailboxSource(filePath).listMailboxes()).rejects.toThrow(SourceError);
    });
  });

  describe('CsvLogonSource', () => {
    it('uses LastLogonDate when no FileTime is set', async () => {
      const filePath = writeFile(
        'logons.csv',
        [
          'UserPrincipalName,LastLogonDate,lastLogonTimestamp',
          'a@contoso.test,2024-05-01T10:00:00Z,',
          'b@contoso.test,,133537248000000000',
          ',2024-05-01T10:00:00Z,',
          'c@contoso.test,,',
          '',
        ].join('\n')
      );

      const logons = await new CsvLogonSource(filePath).listLastLogons();

      expect(logons).toEqual([
        { userPrincipalName: 'a@contoso.test', lastLogon: '2024-05-01T10:00:00Z' },
        { userPrincipalName: 'b@contoso.test', lastLogon: new Date('2024-03-01T00:00:00Z') },
        { userPrincipalName: 'c@contoso.test', lastLogon: null },
      ]);
    });

    it('prefers the FileTime over a locale-formatted LastLogonDate', async () => {
      const filePath = writeFile(
        'logons.csv',
        [
          'UserPrincipalName,LastLogonDate,lastLogonTimestamp',
          'a@contoso.test,13/03/2024 10:00:00,133537248000000000',
          'b@contoso.test,03/04/2024 10:00:00,133537248000000000',
          'c@contoso.test,13/03/2024 10:00:00,0',
          '',
        ].join('\n')
      );

      const logons = await new CsvLogonSource(filePath).listLastLogons();

      expect(logons).toEqual([
        { userPrincipalName: 'a@contoso.test', lastLogon: new Date('2024-03-01T00:00:00Z') },
        { userPrincipalName: 'b@contoso.test', lastLogon: new Date('2024-03-01T00:00:00Z') },
        { userPrincipalName: 'c@contoso.test', lastLogon: '13/03/2024 10:00:00' },
      ]);

      const [a] = logons;
      expect(mergeSignIn(null, a.lastLogon, NOW)).toEqual({
        source: 'OnPrem',
        lastActivity: new Date('2024-03-01T00:00:00Z'),
        daysSince: 92,
      });
    });

    it('requires a logon column', async () => {
      const filePath = writeFile('logons.csv', 'UserPrincipalName,Enabled\na@contoso.test,True\n');

      await expect(new CsvLogonSource(filePath).listLastLogons()).rejects.toThrow(
        `Missing column LastLogonDate or lastLogonTimestamp: ${filePath}`
      );
    });
  });
});
