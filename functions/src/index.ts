import { initializeApp } from "firebase-admin/app";

// Initialize Firebase Admin
initializeApp();

// Conversation
export { chatTurn } from './functions/chatTurn';
export { getConversation } from './functions/getConversation';

// Profile
export { getProfile, updateProfile } from './functions/profile';

// Bills
export { compareBills, importBill } from './functions/bills';
