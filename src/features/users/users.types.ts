export interface PublicUser {
  id: string;
  name: string;
  email: string;
  roles: string[];
}
