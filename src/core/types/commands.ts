export interface Command {
  name: string;
  argument: string;
}
