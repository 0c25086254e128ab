import type { FieldDescriptor } from '../../src/engine/types';
import type { ProfileInput } from '../../src/profile/schema';
import type { MockElementInit } from '../../src/adapters/mock';

export const JANE: ProfileInput = {
  fullName: 'Jane Doe',
  email: 'jane@x.com',
  phone: '555-1234',
};

export const JANE_FULL: ProfileInput = {
  ...JANE,
  address: '12 Elm Street, Springfield',
  education: [
    {
      institution: 'State University',
      degree: 'Bachelor of Science',
      field: 'Computer Science',
      startDate: '2015-09',
      endDate: '2019-05',
    },
  ],
  experience: [
    {
      employer: 'Acme Corp',
      title: 'Software Engineer',
      startDate: 'Jun 2019',
      endDate: 'Present',
      description: 'Built internal tools.',
    },
  ],
  skills: ['TypeScript', 'Go', 'typescript'],
};

export function descriptor(overrides: Partial<FieldDescriptor> & Pick<FieldDescriptor, 'id'>): FieldDescriptor {
  return {
    kind: 'text',
    label: '',
    placeholder: '',
    name: '',
    domId: overrides.id,
    required: false,
    options: [],
    index: 0,
    ...overrides,
  };
}

/** Index descriptors in the order given. */
export function inOrder(list: FieldDescriptor[]): FieldDescriptor[] {
  return list.map((d, index) => ({ ...d, index }));
}

export const CONTACT_FORM: MockElementInit[] = [
  { tag: 'input', type: 'text', id: 'full_name', labelText: 'Full Name *', required: true },
  { tag: 'input', type: 'email', id: 'email', labelText: 'Email', required: true },
  { tag: 'input', type: 'tel', id: 'phone', labelText: 'Phone' },
];
