import { UnsupportedFormatError, ValidationError } from './errorHandler';
import { mapCsvRow, parseCsvJobs, parseJobFile, parseJsonJobs } from './jobImport';

describe('mapCsvRow', () => {
  it('maps column aliases case-insensitively', () => {
    expect(mapCsvRow({ Position: 'QA Engineer', Level: '', Experience: 'Senior', Pay: 100 })).toEqual({
      job_title: 'QA Engineer',
      company: '',
      description: '',
      required_skills: '',
      experience_level: 'Senior',
      education_requirements: '',
      location: '',
      salary_range: '100'
    });
  });
});

describe('parseCsvJobs', () => {
  it('reads rows through the alias table', () => {
    const csv = [
      'Title,Employer,Skills,Description,City,job_id',
      'Backend Developer,Acme,"Python, SQL",Build APIs,Riyadh,be-1',
      'Analyst,,Excel,Crunch numbers,,'
    ].join('\n');

    expect(parseCsvJobs(csv)).toEqual([
      {
        id: 'be-1',
        job_title: 'Backend Developer',
        company: 'Acme',
        description: 'Build APIs',
        required_skills: 'Python, SQL',
        experience_level: '',
        education_requirements: '',
        location: 'Riyadh',
        salary_range: ''
      },
      {
        job_title: 'Analyst',
        company: '',
        description: 'Crunch numbers',
        required_skills: 'Excel',
        experience_level: '',
        education_requirements: '',
        location: '',
        salary_range: ''
      }
    ]);
  });

  it('refuses workbook content uploaded as CSV', () => {
    expect(() => parseCsvJobs('PK\u0003\u0004[Content_Types].xml')).toThrow('Job file is not a CSV text file');
    expect(() => parseCsvJobs('  <?xml version="1.0"?><Workbook/>')).toThrow(ValidationError);
  });

  it('ignores a byte order mark', () => {
    expect(parseCsvJobs('\uFEFFtitle,description\nTester,Write tests')).toEqual([
      expect.objectContaining({ job_title: 'Tester', description: 'Write tests' })
    ]);
  });
});

describe('parseJsonJobs', () => {
  it('accepts an array, a jobs envelope or a single record', () => {
    expect(parseJsonJobs('[{"job_title":"A"}]')).toEqual([{ job_title: 'A' }]);
    expect(parseJsonJobs('{"jobs":[{"job_title":"B"}]}')).toEqual([{ job_title: 'B' }]);
    expect(parseJsonJobs('{"job_title":"C"}')).toEqual([{ job_title: 'C' }]);
  });

  it('rejects invalid content', () => {
    expect(() => parseJsonJobs('{bad')).toThrow('Job file is not valid JSON');
    expect(() => parseJsonJobs('42')).toThrow(ValidationError);
  });
});

describe('parseJobFile', () => {
  it('dispatches on the file extension', () => {
    const file = { buffer: Buffer.from('[{"job_title":"A"}]'), originalname: 'jobs.JSON', mimetype: 'application/octet-stream' };

    expect(parseJobFile(file)).toEqual([{ job_title: 'A' }]);
  });

  it('refuses a zipped workbook renamed to .csv', () => {
    const file = { buffer: Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]), originalname: 'jobs.csv', mimetype: 'text/csv' };

    expect(() => parseJobFile(file)).toThrow(ValidationError);
  });

  it('rejects other file types', () => {
    const file = { buffer: Buffer.from('jobs'), originalname: 'jobs.txt', mimetype: 'text/plain' };

    expect(() => parseJobFile(file)).toThrow(UnsupportedFormatError);
  });
});
