import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { RegisterMemberDto } from '../dto/register-member.dto';
import { toFieldErrors } from '../../../common/exceptions/validation-failed.exception';

describe('RegisterMemberDto', () => {
  const valid = {
    regNumber: 'T/DEG/2025/001',
    email: 'john.doe@example.com',
    fullName: 'John Doe',
    password: 'StrongPass123!',
    confirmPassword: 'StrongPass123!',
    departmentId: '11111111-1111-4111-8111-111111111111',
    courseId: '22222222-2222-4222-8222-222222222222',
  };

  async function fieldErrors(input: Record<string, unknown>) {
    const dto = plainToInstance(RegisterMemberDto, input);
    return toFieldErrors(await validate(dto));
  }

  it('should accept a valid registration', async () => {
    expect(await fieldErrors(valid)).toEqual([]);
  });

  it('should normalize registration number, email and name', () => {
    const dto = plainToInstance(RegisterMemberDto, {
      ...valid,
      regNumber: ' t/dip/2024/12 ',
      email: 'JOHN.Doe@Example.COM ',
      fullName: ' John \t Doe  ',
    });

    expect(dto.regNumber).toBe('T/DIP/2024/12');
    expect(dto.email).toBe('john.doe@example.com');
    expect(dto.fullName).toBe('John Doe');
  });

  it.each(['T/DEG/25/001', 'DEG/2025/001', 'T/D/2025/001', 'T/DEG/2025/123456'])(
    'should reject registration number %s',
    async (regNumber) => {
      expect(await fieldErrors({ ...valid, regNumber })).toEqual([
        {
          field: 'regNumber',
          messages: [
            'Registration number must follow the format T/LEVEL/YEAR/NUMBER (e.g. T/DEG/2025/001)',
          ],
        },
      ]);
    },
  );

  it('should require first and last name', async () => {
    expect(await fieldErrors({ ...valid, fullName: ' Madonna ' })).toEqual([
      { field: 'fullName', messages: ['Please enter your full name (first and last name)'] },
    ]);
  });

  it('should require matching passwords', async () => {
    expect(await fieldErrors({ ...valid, confirmPassword: 'StrongPass123?' })).toEqual([
      { field: 'confirmPassword', messages: ['Passwords do not match'] },
    ]);
  });

  it('should treat an empty course as not selected', async () => {
    const dto = plainToInstance(RegisterMemberDto, { ...valid, courseId: '' });

    expect(dto.courseId).toBeUndefined();
    expect(toFieldErrors(await validate(dto))).toEqual([]);
  });

  it('should reject a malformed department ID', async () => {
    expect(await fieldErrors({ ...valid, departmentId: 'software' })).toEqual([
      { field: 'departmentId', messages: ['Select a valid department'] },
    ]);
  });
});
