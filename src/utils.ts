export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function toPublicUser(user: {
  id: number;
  username: string;
  email: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    is_active: user.isActive,
    created_at: user.createdAt,
    updated_at: user.updatedAt
  };
}

export function withTimeout<T>(task: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([task, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
