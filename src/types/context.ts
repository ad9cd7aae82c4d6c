export interface UserProfile {
  fullName: string;
  email: string;
  phone: string;
  location?: string;
  linkedin?: string;
  website?: string;
  github?: string;
  skills?: string[];
}

export interface ResumeAsset {
  path: string;
  sha256?: string;
}

export interface SkillEntry {
  skill: string;
  aliases?: string[];
  weight?: number;
}
