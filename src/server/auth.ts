// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { unauthorized } from '@/src/server/http';
import { createSupabaseServerClient } from '@/src/server/supabase/server';

export interface AuthenticatedUser {
  id: string;
  email: string | null;
}

/** Resolves the caller or throws a 401 `ApiError`. */
export type Authenticator = () => Promise<AuthenticatedUser>;

export async function getUserOrNull(): Promise<AuthenticatedUser | null> {
  const supabase = createSupabaseServerClient();
  const { data, error } = await supabase.auth.getUser();
  if (error || !data.user) {
    return null;
  }
  return { id: data.user.id, email: data.user.email ?? null };
}

export async function requireUser(): Promise<AuthenticatedUser> {
  const user = await getUserOrNull();
  if (!user) {
    throw unauthorized('Sign in required');
  }
  return user;
}
