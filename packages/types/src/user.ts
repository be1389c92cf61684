export interface UserProfile {
  id: string;
  userId: string;
  email: string;
  displayName: string | null;
  phoneNumbers: string[];
  createdAtIso: string;
  updatedAtIso: string;
}

export interface CreateUserRequest {
  userId: string;
  email: string;
  displayName?: string;
  phoneNumbers?: string[];
}

export interface CreateUserResponse {
  success: true;
  user: UserProfile;
}
