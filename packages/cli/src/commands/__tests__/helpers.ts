import { vi } from 'vitest';
import colors from 'ansi-colors';

export const minimalDescription = {
  arazzo: '1.0.1',
  info: { title: 'Pet adoption', version: '1.0.0' },
  sourceDescriptions: [
    { name: 'petStore', url: 'https://example.com/petstore.openapi.yaml', type: 'openapi' },
  ],
  workflows: [
    {
      workflowId: 'adoptPet',
      summary: 'Adopt an available pet',
      steps: [
        { stepId: 'findPet', operationId: 'findPets' },
        { stepId: 'adopt', operationPath: '/pets/{petId}/adopt' },
      ],
    },
    {
      workflowId: 'notifyOwner',
      dependsOn: ['adoptPet'],
      steps: [{ stepId: 'notify', workflowId: 'adoptPet' }],
    },
  ],
};

/**
 * Capture console.log and console.error lines without colors, and turn
 * process.exit into an exception
 */
export function captureOutput() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const spies = [
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(colors.unstyle(args.map(String).join(' ')));
    }),
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr.push(colors.unstyle(args.map(String).join(' ')));
    }),
    vi
      .spyOn(process, 'exit')
      .mockImplementation((code?: string | number | null) => {
        throw new Error(`process.exit(${code})`);
      }),
  ];

  return {
    stdout,
    stderr,
    restore: () => spies.forEach(spy => spy.mockRestore()),
  };
}
