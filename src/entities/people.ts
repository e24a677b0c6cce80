import { z } from "zod";
import type { EntityType } from "./types.js";

export const PersonSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export type Person = z.infer<typeof PersonSchema>;

export const OnsiteEmployeeSchema = PersonSchema.extend({
  kind: z.literal("onsite"),
});

export const RemoteEmployeeSchema = PersonSchema.extend({
  kind: z.literal("remote"),
  location: z.string().min(1),
});

export const EmployeeSchema = z.discriminatedUnion("kind", [
  OnsiteEmployeeSchema,
  RemoteEmployeeSchema,
]);

export type OnsiteEmployee = z.infer<typeof OnsiteEmployeeSchema>;
export type RemoteEmployee = z.infer<typeof RemoteEmployeeSchema>;
export type Employee = z.infer<typeof EmployeeSchema>;

export const PersonType: EntityType<Person> = { name: "Person", schema: PersonSchema };
export const EmployeeType: EntityType<Employee> = { name: "Employee", schema: EmployeeSchema };
export const RemoteEmployeeType: EntityType<RemoteEmployee> = {
  name: "RemoteEmployee",
  schema: RemoteEmployeeSchema,
};

// A person is keyed by their name.
export function employee(name: string): OnsiteEmployee {
  return { kind: "onsite", id: name, name };
}

export function remoteEmployee(name: string, location: string): RemoteEmployee {
  return { kind: "remote", id: name, name, location };
}
