import type { ActivitySeed } from './types.js';

export const SEED_ACTIVITIES: ActivitySeed[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  {
    name: 'Soccer Team',
    description: 'Practice drills and play matches against other schools',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 22,
    participants: ['liam@mergington.edu', 'noah@mergington.edu'],
  },
  {
    name: 'Tennis Club',
    description: 'Improve your serve and play singles and doubles',
    schedule: 'Wednesdays, 3:30 PM - 5:00 PM',
    maxParticipants: 10,
    participants: ['ava@mergington.edu'],
  },
  {
    name: 'Art Club',
    description: 'Explore painting, drawing and mixed media',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
    participants: ['mia@mergington.edu', 'amelia@mergington.edu'],
  },
  {
    name: 'Drama Club',
    description: 'Act, direct and stage the school plays',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 20,
    participants: ['ella@mergington.edu', 'scarlett@mergington.edu'],
  },
  {
    name: 'Math Club',
    description: 'Solve challenging problems and prepare for competitions',
    schedule: 'Tuesdays, 3:30 PM - 4:30 PM',
    maxParticipants: 10,
    participants: ['james@mergington.edu', 'benjamin@mergington.edu'],
  },
  {
    name: 'Debate Team',
    description: 'Develop public speaking and argumentation skills',
    schedule: 'Fridays, 4:00 PM - 5:30 PM',
    maxParticipants: 12,
    participants: ['charlotte@mergington.edu', 'henry@mergington.edu'],
  },
];
