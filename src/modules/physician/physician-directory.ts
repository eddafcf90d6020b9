import { Logger } from '@nestjs/common';
import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

export const PhysicianSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  specializations: z.array(z.string().min(1)).default([]),
});

export type Physician = z.infer<typeof PhysicianSchema>;

/**
 * Read-only view of who can be booked. Profiles are managed elsewhere; the
 * scheduler only needs ids, display names and specialisations.
 */
export abstract class PhysicianDirectory {
  abstract listPhysicians(specialization?: string): Promise<Physician[]>;
}

export class InMemoryPhysicianDirectory extends PhysicianDirectory {
  private readonly physicians: Physician[];

  constructor(physicians: Physician[]) {
    super();
    this.physicians = [...physicians].sort((a, b) => a.name.localeCompare(b.name));
  }

  async listPhysicians(specialization?: string): Promise<Physician[]> {
    const wanted = specialization?.trim().toLowerCase();
    if (!wanted) return [...this.physicians];
    return this.physicians.filter((p) =>
      p.specializations.some((s) => s.toLowerCase() === wanted),
    );
  }
}

export function loadPhysicianDirectory(path: string): InMemoryPhysicianDirectory {
  if (!existsSync(path)) {
    new Logger(PhysicianDirectory.name).warn(
      `Physician directory file ${path} not found, starting empty`,
    );
    return new InMemoryPhysicianDirectory([]);
  }
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return new InMemoryPhysicianDirectory(z.array(PhysicianSchema).parse(raw));
}
