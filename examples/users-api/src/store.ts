export type User = {
  id: string;
  name: string;
  region: string;
};

// In-memory user storage
class UserStore {
  private users: Map<string, User> = new Map();

  constructor(users: User[]) {
    for (const user of users) {
      this.users.set(user.id, user);
    }
  }

  getById(id: string): User | undefined {
    return this.users.get(id);
  }
}

export const store = new UserStore([
  {id: '1', name: 'Ada', region: 'eu-west-1'},
  {id: '2', name: 'Grace', region: 'us-east-1'},
]);
