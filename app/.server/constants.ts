export const API_NAME = 'MoodDecode NLP API';
