export type UserId = number;

export interface User {
  userId: UserId;
  name: string;
}
